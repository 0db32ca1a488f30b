/* config.ts - Environment configuration for the navigation host */

import { z } from 'zod';

export const serverConfigSchema = z.object({
  PORT: z.string().regex(/^\d+$/, 'must be an integer').transform(Number).default('9754'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  NAV_MAP: z.string().min(1).default('maps/hamlet.json'),
  NAV_MAX_EXPANSIONS: z.string().regex(/^\d+$/, 'must be an integer').transform(Number).optional(),
});

export interface ServerConfig {
  port: number;
  isDev: boolean;
  mapPath: string;
  maxExpansions: number | undefined;
}

/** Throws with every offending variable listed */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = serverConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const c = result.data;
  return {
    port: c.PORT,
    isDev: c.NODE_ENV !== 'production',
    mapPath: c.NAV_MAP,
    maxExpansions: c.NAV_MAX_EXPANSIONS,
  };
}
