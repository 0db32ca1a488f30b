/* validation.ts - Zod schemas + Express middleware for navigation requests */

import { z } from 'zod';
import { mobileEntitySchema } from './map-file';
import { DEFAULT_RADIUS } from './nav-engine';

// ── Schemas ──────────────────────────────────────────────────

export const pointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const radiusSchema = z.number().positive().max(2).default(DEFAULT_RADIUS);

export const pathRequestSchema = z.object({
  start: pointSchema,
  goal: pointSchema,
  radius: radiusSchema,
});

export const blockedRequestSchema = z.object({
  position: pointSchema,
  radius: radiusSchema,
  excludeEntity: z.string().min(1).optional(),
});

export const lineOfSightRequestSchema = z.object({
  from: pointSchema,
  to: pointSchema,
  radius: radiusSchema,
});

export const entitiesUpdateSchema = z.object({
  entities: z.array(mobileEntitySchema).max(1000),
});

export type PathRequest = z.infer<typeof pathRequestSchema>;
export type BlockedRequest = z.infer<typeof blockedRequestSchema>;
export type LineOfSightRequest = z.infer<typeof lineOfSightRequestSchema>;
export type EntitiesUpdate = z.infer<typeof entitiesUpdateSchema>;

// ── Handler shapes ───────────────────────────────────────────
// The slices of Express's Request and Response these handlers touch

export interface BodyCarrier {
  body: unknown;
}

export interface JsonReply {
  json(body: unknown): unknown;
}

export interface StatusReply extends JsonReply {
  status(code: number): JsonReply;
}

// ── Middleware factories ─────────────────────────────────────

/**
 * Validates req.body against a Zod schema.
 * On success: replaces req.body with parsed data and calls next().
 * On failure: responds 400 with validation error details.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: BodyCarrier, res: StatusReply, next: () => void): void => {
    const result = schema.safeParse(req.body);
    if (result.success) {
      req.body = result.data;
      next();
    } else {
      res.status(400).json({
        ok: false,
        error: 'Validation failed',
        details: result.error.issues,
      });
    }
  };
}

// ── Error handler (must be LAST middleware) ───────────────────

// Four parameters, so Express registers it as an error handler
export function errorHandler(err: unknown, _req: unknown, res: StatusReply, _next: unknown): void {
  console.error('[ERROR]', err);
  res.status(500).json({ ok: false, error: 'Internal server error' });
}
