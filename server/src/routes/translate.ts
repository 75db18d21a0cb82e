import { Router, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { debugLog } from '../utils/logger';
import type { ErrorCode } from '../core/errors';
import type { Failure, TranslationService } from '../services/translation-service';

export interface TranslateRouterOptions {
  maxUploadBytes: number;
}

const uploadFieldsSchema = z.object({
  custom_prompt: z.string().optional()
});

const jobBodySchema = z.object({
  text: z.string(),
  instructions: z.string().optional(),
  filename: z.string().optional()
});

export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case 'EMPTY_INPUT':
    case 'UNSUPPORTED_FORMAT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'NOT_READY':
      return 409;
    default:
      return 500;
  }
}

function sendFailure(res: Response, failure: Failure): void {
  res.status(httpStatusFor(failure.code)).json(failure);
}

export function createTranslateRouter(service: TranslationService, options: TranslateRouterOptions): Router {
  const router = Router();

  // Le fichier reste en mémoire : rien n'est écrit sur le disque
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 }
  });

  router.post('/upload', upload.single('novel_file'), (req, res) => {
    if (!req.file) {
      return sendFailure(res, { success: false, code: 'EMPTY_INPUT', message: 'Aucun fichier fourni' });
    }

    const fields = uploadFieldsSchema.safeParse(req.body ?? {});
    debugLog(`Fichier reçu: ${req.file.originalname} (${req.file.size} octets)`);

    const result = service.submit({
      buffer: req.file.buffer,
      filename: req.file.originalname,
      instructions: fields.success ? fields.data.custom_prompt : undefined
    });
    if (!result.success) {
      return sendFailure(res, result);
    }
    res.status(201).json(result);
  });

  router.post('/jobs', (req, res) => {
    const body = jobBodySchema.safeParse(req.body);
    if (!body.success) {
      return sendFailure(res, {
        success: false,
        code: 'UNSUPPORTED_FORMAT',
        message: 'Corps de requête invalide: le champ "text" est requis'
      });
    }

    const result = service.submit(body.data);
    if (!result.success) {
      return sendFailure(res, result);
    }
    res.status(201).json(result);
  });

  // ?wait=true attend la fin de la traduction avant de répondre
  router.post('/translate/:jobId', async (req, res, next) => {
    try {
      const { jobId } = req.params;
      const started = service.start(jobId);
      if (!started.success) {
        sendFailure(res, started);
        return;
      }
      if (req.query.wait !== 'true') {
        res.status(202).json(started);
        return;
      }

      const final = await service.waitFor(jobId);
      if (!final.success) {
        sendFailure(res, final);
        return;
      }
      res.json({ ...final, message: final.status === 'completed' ? 'Traduction terminée' : 'Traduction en échec' });
    } catch (error) {
      next(error);
    }
  });

  // Route pour vérifier la progression d'une traduction
  router.get('/check_progress/:jobId', (req, res) => {
    const result = service.poll(req.params.jobId);
    if (!result.success) {
      return sendFailure(res, result);
    }
    res.json(result);
  });

  router.get('/download/:jobId', (req, res) => {
    const result = service.fetchResult(req.params.jobId);
    if (!result.success) {
      return sendFailure(res, result);
    }
    res.attachment(result.filename);
    res.type('text/plain; charset=utf-8');
    res.send(result.content);
  });

  // Route pour nettoyer un job terminé
  router.delete('/jobs/:jobId', (req, res) => {
    const result = service.remove(req.params.jobId);
    if (!result.success) {
      return sendFailure(res, result);
    }
    res.json(result);
  });

  return router;
}
