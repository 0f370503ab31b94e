import { createServer } from 'http';
import { Server } from 'socket.io';
import { SUIT_ORDER } from '../../lib/contracts/game.js';
import { readServerEnv } from './config/env.js';
import { readSessionRuntimeConfig } from './config/session-runtime.js';
import { createSessionEngine } from './domain/session-engine.js';
import { createHttpApp } from './http/create-http-app.js';
import { createTelemetry } from './observability/telemetry.js';
import { createBroadcastGateway } from './transport/broadcast-gateway.js';
import { registerSocketHandlers } from './transport/register-socket-handlers.js';
import type { BootstrapSummary } from './domain/types.js';

const env = readServerEnv();
const runtime = readSessionRuntimeConfig();
const telemetry = createTelemetry();

let bootstrapSummary: BootstrapSummary | null = null;

const app = createHttpApp({
  publicDir: runtime.publicDir,
  instructionsPath: runtime.instructionsPath,
  drawnCount: () => engine.drawnCount(),
  onRequest: () => engine.refresh(),
});
const httpServer = createServer(app);
const io = new Server(httpServer, {
  cors: {
    origin: (origin, callback) => {
      callback(null, env.isCorsOriginAllowed(origin));
    },
  },
});

const gateway = createBroadcastGateway(io);
const engine = createSessionEngine({ config: runtime, broadcaster: gateway, telemetry });

registerSocketHandlers(io, engine, gateway);

export const startServer = (port: number = env.port, host: string = env.host): Promise<number> =>
  new Promise((resolve, reject) => {
    if (httpServer.listening) {
      const address = httpServer.address();
      const activePort = typeof address === 'object' && address ? address.port : port;
      resolve(activePort);
      return;
    }

    bootstrapSummary = engine.bootstrap();

    const onError = (error: Error) => {
      httpServer.off('listening', onListening);
      reject(error);
    };

    const onListening = () => {
      httpServer.off('error', onError);
      const address = httpServer.address();
      const activePort = typeof address === 'object' && address ? address.port : port;
      resolve(activePort);
    };

    httpServer.once('error', onError);
    httpServer.once('listening', onListening);
    httpServer.listen(port, host);
  });

export const stopServer = async (): Promise<void> => {
  await engine.flush();
  if (!httpServer.listening) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    io.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
};

const logStartup = (port: number) => {
  console.log(`Materials dir: ${runtime.materialsDir}`);
  if (bootstrapSummary) {
    console.log(`Loaded cards: ${bootstrapSummary.cardCount} (source: ${bootstrapSummary.source})`);
    console.log(`Session: ${bootstrapSummary.restored ? 'restored from snapshot' : 'fresh shuffle'}`);
    for (const suit of SUIT_ORDER) {
      console.log(`${suit}: ${bootstrapSummary.available[suit] ?? 0} available`);
    }
  }
  console.log(`Suit draw server listening on http://localhost:${port}`);
};

const shutdown = (signal: string) => {
  console.log(`Received ${signal}, shutting down.`);
  stopServer()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('Failed to stop server cleanly.', error);
      process.exit(1);
    });
};

if (process.env.NODE_ENV !== 'test') {
  startServer()
    .then((port) => {
      logStartup(port);
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch((error: unknown) => {
      console.error('Failed to start suit draw server.', error);
      process.exitCode = 1;
    });
}
