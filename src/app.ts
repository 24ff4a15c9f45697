import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import type { ArtifactStore } from './artifact-store.js';
import type { CapabilityRegistry } from './capabilities.js';
import type { ArtifactMirror } from './r2-client.js';
import { createOperationsRouter } from './routes.js';

export interface AppDependencies {
  store: ArtifactStore;
  registry: CapabilityRegistry;
  maxUploadBytes: number;
  mirror?: ArtifactMirror | null;
}

function tooLargeMessage(maxUploadBytes: number): string {
  return `File too large. Maximum size is ${Math.floor(maxUploadBytes / (1024 * 1024))} MB.`;
}

/**
 * Caps the request body at `maxBytes`, whether or not the client declares a
 * Content-Length. Once the count is crossed the body is unpiped from whatever
 * is reading it (multer), drained, and the request answered with 413.
 */
export function limitBody(maxBytes: number) {
  return (req: Request, res: Response, next: NextFunction) => {
    const declared = Number(req.headers['content-length'] ?? 0);
    if (declared > maxBytes) {
      res.status(413).json({ error: tooLargeMessage(maxBytes) });
      return;
    }

    let received = 0;
    const count = (chunk: Buffer) => {
      received += chunk.length;
      if (received <= maxBytes) return;

      req.off('data', count);
      req.unpipe();
      req.resume();
      if (!res.headersSent) {
        res.status(413).json({ error: tooLargeMessage(maxBytes) });
      }
    };

    req.on('data', count);
    next();
  };
}

/**
 * Builds the HTTP surface: GET /api/status plus one POST endpoint per
 * operation. Startup concerns (config, sweeper, listen) live in index.ts.
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();
  const { maxUploadBytes, registry } = deps;

  app.use(
    cors({
      exposedHeaders: [
        'Content-Disposition',
        'X-Original-Size',
        'X-Compressed-Size',
        'X-Reduction-Percent',
        'X-Artifact-Url',
      ],
    }),
  );

  app.use(limitBody(maxUploadBytes));

  app.get('/api/status', (_req: Request, res: Response) => {
    res.json({
      status: 'online',
      libraries: registry.libraries(),
      tools_available: registry.listAvailable(),
    });
  });

  app.use(
    '/api',
    createOperationsRouter({
      store: deps.store,
      registry,
      maxUploadBytes,
      mirror: deps.mirror ?? null,
    }),
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express identifies error middleware by its four parameters.
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      const message = error.code === 'LIMIT_FILE_SIZE' ? tooLargeMessage(maxUploadBytes) : error.message;
      res.status(status).json({ error: message });
      return;
    }

    console.error('[app] Unhandled error:', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
