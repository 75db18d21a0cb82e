import pLimit from 'p-limit';
import { debugLog } from '../utils/logger';
import { JobCancelledError, TranslationError } from './errors';
import type { Segment } from '../types/segmentation';
import type { Translator } from '../types/translation';

export interface WorkerPoolOptions {
  translator: Translator;
  concurrency: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  jobId?: string;
}

/**
 * Délai avant la tentative suivante : croissance exponentielle, doublée
 * lorsque le service signale une limite de débit (HTTP 429).
 */
export function retryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  rateLimited = false
): number {
  const delay = baseDelayMs * 2 ** (attempt - 1) * (rateLimited ? 2 : 1);
  return Math.min(delay, maxDelayMs);
}

function asTranslationError(error: unknown): TranslationError {
  if (error instanceof TranslationError) return error;
  return new TranslationError(error instanceof Error ? error.message : String(error), { cause: error });
}

export class TranslationWorkerPool {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<number>();
  private readonly wakeups = new Set<() => void>();
  private closed = false;

  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency invalide: ${options.concurrency}`);
    }
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts invalide: ${options.maxAttempts}`);
    }
    this.limit = pLimit(options.concurrency);
  }

  /**
   * Met un segment en file. La promesse rejette avec une TranslationError
   * une fois les tentatives épuisées (les rejets du circuit breaker ne sont
   * pas comptés), ou une JobCancelledError si le pool a
   * été fermé avant que le segment ne démarre.
   */
  public submit(segment: Segment, instructions: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new JobCancelledError(this.jobLabel));
    }
    if (this.inFlight.has(segment.index)) {
      return Promise.reject(new Error(`Segment ${segment.index} déjà en cours de traduction`));
    }

    this.inFlight.add(segment.index);
    return this.limit(() => this.translateWithRetry(segment, instructions)).finally(() => {
      this.inFlight.delete(segment.index);
    });
  }

  // Les appels en cours se terminent ; plus aucune tentative n'est lancée
  public close(): void {
    this.closed = true;
    for (const wake of [...this.wakeups]) {
      wake();
    }
  }

  private get jobLabel(): string {
    return this.options.jobId || 'inconnu';
  }

  private async translateWithRetry(segment: Segment, instructions: string): Promise<string> {
    const { translator, maxAttempts, retryBaseDelayMs, maxRetryDelayMs } = this.options;
    let lastError: TranslationError | undefined;
    let attempts = 0;

    while (attempts < maxAttempts) {
      if (this.closed) {
        throw new JobCancelledError(this.jobLabel);
      }

      attempts++;
      try {
        return await translator.translate(segment.text, segment.context, instructions);
      } catch (error) {
        lastError = asTranslationError(error);

        // Circuit ouvert : le service n'a pas été appelé, la tentative ne compte pas
        if (lastError.circuitOpen) {
          attempts--;
          const wait = lastError.retryAfterMs ?? retryDelay(1, retryBaseDelayMs, maxRetryDelayMs);
          debugLog(`Segment ${segment.index}: circuit ouvert, nouvel essai dans ${wait} ms`);
          await this.sleep(wait);
          continue;
        }

        debugLog(`Segment ${segment.index}: tentative ${attempts}/${maxAttempts} échouée:`, lastError.message);

        if (!lastError.retryable || attempts >= maxAttempts) break;
        await this.sleep(retryDelay(attempts, retryBaseDelayMs, maxRetryDelayMs, lastError.rateLimited));
      }
    }

    throw new TranslationError(
      `Échec de la traduction du segment ${segment.index} après ${attempts} tentative(s): ${lastError?.message ?? 'erreur inconnue'}`,
      {
        retryable: false,
        statusCode: lastError?.statusCode,
        segmentIndex: segment.index,
        attempts,
        cause: lastError
      }
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const wake = () => {
        clearTimeout(timer);
        this.wakeups.delete(wake);
        resolve();
      };
      this.wakeups.add(wake);
      timer = setTimeout(wake, ms);
    });
  }
}
