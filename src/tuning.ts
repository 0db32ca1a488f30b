/* tuning.ts - Named navigation constants with validated per-engine overrides */

import { z } from 'zod';

export interface NavTuning {
  // Collision
  boundsMargin: number;
  doorRadiusFactor: number;
  doubleDoorRadiusFactor: number;
  openRadiusFactor: number;
  objectClearance: number;       // static objects, chests and NPCs
  enemyClearance: number;
  squeezeProbeGap: number;
  squeezeRadiusFactor: number;

  // Door context
  doorScanRadius: number;
  doorAreaDistance: number;

  // Coarse search
  walkabilityPenalty: number;
  doorCostFactor: number;
  openGroundThreshold: number;
  openGroundCostFactor: number;
  maxExpansions: number;
  goalSearchRadius: number;
  searchObstacleClearance: number;
  subTileObstacleRange: number;

  // Corner smoothing
  cornerThresholdDegrees: number;
  curveBaseOffset: number;
  curveSeverityOffset: number;
  curveRadiusCap: number;
  curveSampleDensity: number;

  // Door navigation
  doorSampleDensity: number;
  doorAlignmentTolerance: number;
  alignmentClearance: number;
  alignmentRadiusPad: number;
  approachClearance: number;
  approachRadiusPad: number;
  exitClearance: number;
  exitRadiusPad: number;

  // Validation
  validationSampleDensity: number;
  alternativeOffset: number;
  lineOfSightDensity: number;
}

export const DEFAULT_NAV_TUNING: Readonly<NavTuning> = Object.freeze({
  boundsMargin: 0.1,
  doorRadiusFactor: 0.4,
  doubleDoorRadiusFactor: 0.3,
  openRadiusFactor: 0.7,
  objectClearance: 0.35,
  enemyClearance: 0.3,
  squeezeProbeGap: 0.2,
  squeezeRadiusFactor: 0.5,

  doorScanRadius: 2,
  doorAreaDistance: 1.5,

  walkabilityPenalty: 2,
  doorCostFactor: 0.1,
  openGroundThreshold: 0.9,
  openGroundCostFactor: 0.8,
  maxExpansions: 500,
  goalSearchRadius: 5,
  searchObstacleClearance: 0.4,
  subTileObstacleRange: 1,

  cornerThresholdDegrees: 45,
  curveBaseOffset: 0.2,
  curveSeverityOffset: 0.3,
  curveRadiusCap: 1.5,
  curveSampleDensity: 8,

  doorSampleDensity: 3,
  doorAlignmentTolerance: 0.3,
  alignmentClearance: 1.0,
  alignmentRadiusPad: 0.6,
  approachClearance: 0.7,
  approachRadiusPad: 0.3,
  exitClearance: 0.8,
  exitRadiusPad: 0.4,

  validationSampleDensity: 4,
  alternativeOffset: 0.3,
  lineOfSightDensity: 2,
});

const factor = z.number().finite().min(0);
const count = z.number().int().min(0);

export const navTuningSchema = z.object({
  boundsMargin: factor,
  doorRadiusFactor: factor,
  doubleDoorRadiusFactor: factor,
  openRadiusFactor: factor,
  objectClearance: factor,
  enemyClearance: factor,
  squeezeProbeGap: factor,
  squeezeRadiusFactor: factor,
  doorScanRadius: count,
  doorAreaDistance: factor,
  walkabilityPenalty: factor,
  doorCostFactor: factor,
  openGroundThreshold: factor.max(1),
  openGroundCostFactor: factor,
  maxExpansions: count,
  goalSearchRadius: count,
  searchObstacleClearance: factor,
  subTileObstacleRange: factor,
  cornerThresholdDegrees: factor.max(180),
  curveBaseOffset: factor,
  curveSeverityOffset: factor,
  curveRadiusCap: factor,
  curveSampleDensity: factor,
  doorSampleDensity: factor,
  doorAlignmentTolerance: factor,
  alignmentClearance: factor,
  alignmentRadiusPad: factor,
  approachClearance: factor,
  approachRadiusPad: factor,
  exitClearance: factor,
  exitRadiusPad: factor,
  validationSampleDensity: factor,
  alternativeOffset: factor,
  lineOfSightDensity: factor,
}) satisfies z.ZodType<NavTuning>;

/**
 * Merge overrides onto the defaults.
 * Throws ZodError when an override is not a finite non-negative number.
 */
export function resolveTuning(overrides: Partial<NavTuning> = {}): NavTuning {
  return navTuningSchema.parse({ ...DEFAULT_NAV_TUNING, ...overrides });
}
