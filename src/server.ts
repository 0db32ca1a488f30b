/* server.ts - Express + Socket.io host for the navigation engine */

import { createServer } from 'http';
import path from 'path';
import { Server } from 'socket.io';
import { loadServerConfig } from './config';
import { loadMapFile } from './map-file';
import { NavigationEngine } from './nav-engine';
import { NavService } from './nav-service';
import { createApp } from './app';
import { getSocketCorsConfig } from './security';
import { blockedRequestSchema, pathRequestSchema } from './validation';

type Ack = (response: unknown) => void;

function start(): void {
  const config = loadServerConfig();
  const mapPath = path.resolve(config.mapPath);
  const { name, world } = loadMapFile(mapPath);
  console.log(`[WORLD] Loaded ${name} (${world.width}x${world.height}) from ${mapPath}`);

  const engine = new NavigationEngine(
    world,
    config.maxExpansions === undefined ? {} : { maxExpansions: config.maxExpansions },
  );
  const nav = new NavService(name, world, engine);

  let io: Server | null = null;
  const app = createApp(nav, {
    isDev: config.isDev,
    onEntitiesChanged: entities => io?.emit('world:entities', entities),
  });

  const httpServer = createServer(app);
  io = new Server(httpServer, {
    cors: getSocketCorsConfig(config.isDev),
  });

  // ── Socket.io ──────────────────────────────────────────────

  io.on('connection', (socket) => {
    console.log(`[WS] Client connected: ${socket.id}`);

    socket.emit('world:summary', nav.summary());

    // Every payload goes through the same schemas as the REST routes
    socket.on('nav:path', (data: unknown, ack?: Ack) => {
      if (typeof ack !== 'function') return;
      const parsed = pathRequestSchema.safeParse(data);
      if (!parsed.success) {
        ack({ ok: false, error: 'Validation failed', details: parsed.error.issues });
        return;
      }
      ack(nav.findPath(parsed.data));
    });

    socket.on('nav:blocked', (data: unknown, ack?: Ack) => {
      if (typeof ack !== 'function') return;
      const parsed = blockedRequestSchema.safeParse(data);
      if (!parsed.success) {
        ack({ ok: false, error: 'Validation failed', details: parsed.error.issues });
        return;
      }
      ack(nav.blocked(parsed.data));
    });

    socket.on('disconnect', () => {
      console.log(`[WS] Client disconnected: ${socket.id}`);
    });
  });

  // ── HTTP server ────────────────────────────────────────────

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`Port ${config.port} is already in use. Kill the other process or use a different port.`);
    } else {
      console.error('Server error:', err);
    }
    process.exit(1);
  });

  httpServer.listen(config.port, '0.0.0.0', () => {
    console.log(`\n  Tile Navigator`);
    console.log(`  ──────────────────────`);
    console.log(`  HTTP:      http://0.0.0.0:${config.port}`);
    console.log(`  WebSocket: ws://0.0.0.0:${config.port}`);
    console.log(`  Map:       ${name} (${world.width}x${world.height})`);
    console.log(`  Search cap: ${engine.tuning.maxExpansions} nodes`);
    console.log(`  ──────────────────────\n`);
  });
}

try {
  start();
} catch (err) {
  console.error('Fatal startup error:', err);
  process.exit(1);
}
