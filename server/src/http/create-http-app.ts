import { existsSync } from 'fs';
import { resolve } from 'path';
import express, { type Express } from 'express';

export type HttpAppOptions = {
  publicDir: string;
  instructionsPath: string;
  drawnCount: () => number;
  /** Runs before every route. */
  onRequest?: () => void;
};

export const createHttpApp = ({ publicDir, instructionsPath, drawnCount, onRequest }: HttpAppOptions): Express => {
  const app = express();

  if (onRequest) {
    app.use((_req, _res, next) => {
      onRequest();
      next();
    });
  }

  app.use('/static', express.static(publicDir));

  app.get('/', (_req, res) => {
    res.sendFile(resolve(publicDir, 'index.html'));
  });

  app.get('/instructions', (_req, res) => {
    if (!existsSync(instructionsPath)) {
      res.status(404).json({ error: 'INSTRUCTIONS_NOT_FOUND' });
      return;
    }
    res.download(instructionsPath);
  });

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true, drawn: drawnCount() });
  });

  return app;
};
