/* security.ts - helmet + CORS configuration for the navigation host */

import helmet from 'helmet';
import cors from 'cors';
import type { Express } from 'express';

export interface SocketCorsConfig {
  origin: boolean;
  methods: string[];
}

/**
 * Configure security middleware (helmet + CORS).
 * Must be called BEFORE other middleware / route registration.
 */
export function setupSecurity(app: Express, isDev: boolean): void {
  // JSON-only API: the default helmet policy (including CSP) applies as is
  app.use(helmet());

  // Development tools on other origins may call in; production is same-origin only
  if (isDev) {
    app.use(
      cors({
        origin: true,
        methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      }),
    );
  }
}

/** Socket.io CORS mirroring the HTTP policy above */
export function getSocketCorsConfig(isDev: boolean): SocketCorsConfig {
  return { origin: isDev, methods: ['GET', 'POST'] };
}
