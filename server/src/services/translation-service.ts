import path from 'path';
import { TextSegmenter, estimateTokens } from '../core/text-segmenter';
import {
  NotFoundError,
  UnsupportedFormatError,
  isPipelineError,
  toErrorInfo,
  type ErrorCode
} from '../core/errors';
import { languageCode, languageName } from '../config/languages';
import { debugLog, errorLog, infoLog } from '../utils/logger';
import { JobCoordinator } from './job-coordinator';
import type { JobRegistry } from './job-registry';
import type { JobSnapshot, JobStatus, SourceDocument, Translator } from '../types/translation';

export const ALLOWED_EXTENSIONS = ['.txt'];
const DEFAULT_FILENAME = 'document.txt';

export interface PipelineSettings {
  concurrency: number;
  maxSegmentSize: number;
  maxContextChars: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  stallTimeoutMs: number;
}

export interface TranslationServiceOptions {
  registry: JobRegistry;
  translator: Translator;
  defaultInstructions: string;
  targetLanguage: string;
  pipeline: PipelineSettings;
}

export interface SubmitInput {
  text?: string;
  buffer?: Buffer;
  filename?: string;
  instructions?: string;
}

export interface Failure {
  success: false;
  code: ErrorCode;
  message: string;
}

export type SubmitResponse =
  | { success: true; jobId: string; message: string; totalSegments: number; estimatedTokens: number }
  | Failure;

export type StartResponse = { success: true; message: string; status: JobStatus } | Failure;

export type PollResponse =
  | ({ success: true } & Pick<JobSnapshot, 'status' | 'progress' | 'completedCount' | 'totalCount' | 'error'>)
  | Failure;

export type FetchResponse =
  | { success: true; filename: string; content: Buffer }
  | (Failure & { status?: JobStatus });

export type RemoveResponse = { success: true; message: string } | Failure;

function validateFilename(filename: string | undefined): string {
  const name = filename?.trim() || DEFAULT_FILENAME;
  const ext = path.extname(name).toLowerCase();
  if (!ALLOWED_EXTENSIONS.includes(ext)) {
    throw new UnsupportedFormatError(
      `Format de fichier non supporté (${ext || 'sans extension'}). Seuls les fichiers ${ALLOWED_EXTENSIONS.join(', ')} sont acceptés.`
    );
  }
  return name;
}

export function decodeDocument(input: Pick<SubmitInput, 'text' | 'buffer'>): string {
  if (input.buffer) {
    if (input.buffer.includes(0)) {
      throw new UnsupportedFormatError('Le fichier contient des données binaires');
    }
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(input.buffer);
    } catch {
      throw new UnsupportedFormatError('Le fichier n\'est pas un texte UTF-8 valide');
    }
  }

  const text = input.text ?? '';
  if (text.includes('\u0000')) {
    throw new UnsupportedFormatError('Le texte contient des données binaires');
  }
  return text;
}

export function outputFilename(filename: string, targetLanguage: string): string {
  const base = path.basename(filename, path.extname(filename)).replace(/[^\p{L}\p{N}._-]+/gu, '_') || 'document';
  return `${base}_translated_${languageCode(targetLanguage)}.txt`;
}

/**
 * Point d'entrée du pipeline pour la couche HTTP : soumission, démarrage,
 * suivi et récupération du résultat. Les erreurs sont renvoyées sous forme
 * `{ success: false, code, message }`.
 */
export class TranslationService {
  private readonly segmenter: TextSegmenter;

  constructor(private readonly options: TranslationServiceOptions) {
    this.segmenter = new TextSegmenter({
      maxSegmentSize: options.pipeline.maxSegmentSize,
      maxContextChars: options.pipeline.maxContextChars
    });
  }

  public get targetLanguage(): string {
    return languageName(this.options.targetLanguage);
  }

  public submit(input: SubmitInput): SubmitResponse {
    try {
      const filename = validateFilename(input.filename);
      const text = decodeDocument(input);
      const segments = this.segmenter.segmentText(text);
      const instructions = input.instructions?.trim() || this.options.defaultInstructions;

      const document: SourceDocument = {
        text,
        instructions,
        filename,
        targetLanguage: this.options.targetLanguage
      };

      const { registry, translator, pipeline } = this.options;
      const jobId = registry.create(id => new JobCoordinator(id, document, segments, {
        translator,
        concurrency: pipeline.concurrency,
        maxAttempts: pipeline.maxAttempts,
        retryBaseDelayMs: pipeline.retryBaseDelayMs,
        maxRetryDelayMs: pipeline.maxRetryDelayMs,
        stallTimeoutMs: pipeline.stallTimeoutMs
      }));

      infoLog(`Job ${jobId} créé: ${filename}, ${text.length} caractères, ${segments.length} segment(s)`);
      return {
        success: true,
        jobId,
        message: 'Fichier chargé, traduction prête à démarrer',
        totalSegments: segments.length,
        estimatedTokens: estimateTokens(text)
      };
    } catch (error) {
      return this.failure(error);
    }
  }

  public start(jobId: string): StartResponse {
    try {
      const coordinator = this.options.registry.get(jobId);
      if (coordinator.status !== 'queued' || coordinator.isCancelled) {
        return {
          success: true,
          message: `Traduction déjà lancée (statut: ${coordinator.status})`,
          status: coordinator.status
        };
      }

      coordinator.run().catch((error: unknown) => {
        errorLog(`Job ${jobId}: erreur inattendue`, error);
      });
      return { success: true, message: 'Traduction démarrée', status: coordinator.status };
    } catch (error) {
      return this.failure(error);
    }
  }

  public poll(jobId: string): PollResponse {
    try {
      const { status, progress, completedCount, totalCount, error } = this.options.registry.get(jobId).snapshot();
      return { success: true, status, progress, completedCount, totalCount, error };
    } catch (error) {
      return this.failure(error);
    }
  }

  /**
   * Attend la fin d'un job démarré et renvoie son état final.
   */
  public async waitFor(jobId: string): Promise<PollResponse> {
    const coordinator = this.options.registry.find(jobId);
    if (!coordinator) {
      return this.poll(jobId);
    }
    if (coordinator.status === 'queued') {
      return {
        success: false,
        code: 'NOT_READY',
        message: `Le job ${jobId} n'a pas été démarré`
      };
    }
    await coordinator.whenSettled();
    return this.poll(jobId);
  }

  public fetchResult(jobId: string): FetchResponse {
    try {
      const coordinator = this.options.registry.get(jobId);
      const content = Buffer.from(coordinator.getResult(), 'utf-8');
      debugLog(`Job ${jobId}: résultat récupéré (${content.length} octets)`);
      return {
        success: true,
        filename: outputFilename(coordinator.document.filename, coordinator.document.targetLanguage),
        content
      };
    } catch (error) {
      const status = this.options.registry.find(jobId)?.status;
      return status === undefined ? this.failure(error) : { ...this.failure(error), status };
    }
  }

  public remove(jobId: string): RemoveResponse {
    if (!this.options.registry.remove(jobId)) {
      return this.failure(new NotFoundError(jobId));
    }
    return { success: true, message: 'Job supprimé' };
  }

  private failure(error: unknown): Failure {
    if (!isPipelineError(error)) {
      errorLog('Erreur inattendue:', error);
    }
    const { code, message } = toErrorInfo(error);
    return { success: false, code, message };
  }
}
