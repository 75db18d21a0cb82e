import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createTranslateRouter } from './routes/translate';
import { debugLog, errorLog } from './utils/logger';
import type { TranslationService } from './services/translation-service';

export interface AppOptions {
  service: TranslationService;
  corsOrigins: string[];
  maxUploadBytes: number;
  exposeErrorDetails?: boolean;
}

// Statut porté par les erreurs de body-parser (400, 413...)
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.use(cors({
    origin: options.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  app.use(express.json({ limit: options.maxUploadBytes }));

  // Logging middleware
  app.use((req, _res, next) => {
    debugLog(`${req.method} ${req.url}`);
    next();
  });

  app.use('/api', createTranslateRouter(options.service, { maxUploadBytes: options.maxUploadBytes }));

  // Health check route
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({
        success: false,
        code: 'UNSUPPORTED_FORMAT',
        message: err.code === 'LIMIT_FILE_SIZE' ? 'Fichier trop volumineux' : err.message
      });
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({
        success: false,
        code: 'UNSUPPORTED_FORMAT',
        message: status === 413 ? 'Requête trop volumineuse' : 'Requête invalide'
      });
      return;
    }

    errorLog('Error:', err);
    res.status(500).json({
      success: false,
      code: 'INTERNAL_ERROR',
      message: 'Une erreur est survenue',
      details: options.exposeErrorDetails && err instanceof Error ? err.message : undefined
    });
  });

  return app;
}
