import { EventEmitter } from 'events';
import { TranslationWorkerPool } from '../core/worker-pool';
import { reassembleText } from '../core/text-segmenter';
import {
  JobCancelledError,
  JobTimeoutError,
  NotReadyError,
  toErrorInfo
} from '../core/errors';
import { debugLog, errorLog, infoLog } from '../utils/logger';
import type { Segment } from '../types/segmentation';
import type {
  Job,
  JobErrorInfo,
  JobSnapshot,
  JobStatus,
  SourceDocument,
  Translator
} from '../types/translation';

export interface JobCoordinatorOptions {
  translator: Translator;
  concurrency: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  stallTimeoutMs: number;
}

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: []
};

export function progressPercent(completedCount: number, totalCount: number): number {
  if (totalCount <= 0) return 0;
  return Math.floor((completedCount * 100) / totalCount);
}

/**
 * Pilote un job de traduction : répartit les segments sur le pool, collecte
 * les résultats par index, suit la progression et réassemble le texte.
 * Seul le coordinateur modifie l'état du job ; les lectures passent par
 * `snapshot()`.
 */
export class JobCoordinator {
  private readonly job: Job;
  private readonly pool: TranslationWorkerPool;
  private readonly eventEmitter = new EventEmitter();
  private watchdog?: NodeJS.Timeout;
  private settled?: Promise<JobSnapshot>;
  private cancelled = false;

  constructor(
    id: string,
    document: SourceDocument,
    segments: readonly Segment[],
    private readonly options: JobCoordinatorOptions
  ) {
    if (segments.length === 0) {
      throw new RangeError('Un job doit contenir au moins un segment');
    }

    const now = new Date();
    this.job = {
      id,
      document,
      segments,
      results: new Map(),
      status: 'queued',
      completedCount: 0,
      totalCount: segments.length,
      createdAt: now,
      updatedAt: now
    };
    this.pool = new TranslationWorkerPool({
      translator: options.translator,
      concurrency: options.concurrency,
      maxAttempts: options.maxAttempts,
      retryBaseDelayMs: options.retryBaseDelayMs,
      maxRetryDelayMs: options.maxRetryDelayMs,
      jobId: id
    });
  }

  public get id(): string {
    return this.job.id;
  }

  public get status(): JobStatus {
    return this.job.status;
  }

  public get document(): SourceDocument {
    return this.job.document;
  }

  public get segments(): readonly Segment[] {
    return this.job.segments;
  }

  public get createdAt(): Date {
    return this.job.createdAt;
  }

  public get finishedAt(): Date | undefined {
    return this.job.finishedAt;
  }

  public get isTerminal(): boolean {
    return this.job.status === 'completed' || this.job.status === 'failed';
  }

  public get isCancelled(): boolean {
    return this.cancelled;
  }

  public snapshot(): JobSnapshot {
    return {
      id: this.job.id,
      status: this.job.status,
      progress: progressPercent(this.job.completedCount, this.job.totalCount),
      completedCount: this.job.completedCount,
      totalCount: this.job.totalCount,
      error: this.job.error ? { ...this.job.error } : undefined,
      createdAt: this.job.createdAt.toISOString(),
      updatedAt: this.job.updatedAt.toISOString()
    };
  }

  public onProgress(listener: (snapshot: JobSnapshot) => void): () => void {
    this.eventEmitter.on('progress', listener);
    return () => {
      this.eventEmitter.off('progress', listener);
    };
  }

  public getResult(): string {
    if (this.job.status !== 'completed' || this.job.resultText === undefined) {
      throw new NotReadyError(this.job.id, this.job.status);
    }
    return this.job.resultText;
  }

  /**
   * Lance la traduction et résout avec l'état final dès que le job est
   * terminé, même si des appels sont encore en cours.
   */
  public run(): Promise<JobSnapshot> {
    if (this.job.status !== 'queued' || this.cancelled) {
      return Promise.resolve(this.snapshot());
    }

    const terminal = this.whenSettled();

    this.transition('processing');
    this.armWatchdog();
    infoLog(`Job ${this.job.id}: ${this.job.totalCount} segment(s) envoyés à la traduction`);

    const dispatched = this.job.segments.map(segment =>
      this.pool.submit(segment, this.job.document.instructions).then(
        text => this.recordResult(segment.index, text),
        (error: unknown) => this.recordFailure(segment.index, error)
      )
    );

    Promise.all(dispatched).catch((error: unknown) => this.fail(toErrorInfo(error)));

    return terminal;
  }

  /**
   * Résout avec l'état final du job. Un job annulé avant d'avoir démarré ne
   * se termine jamais.
   */
  public whenSettled(): Promise<JobSnapshot> {
    if (this.isTerminal) {
      return Promise.resolve(this.snapshot());
    }
    // Une seule écoute de 'terminal', partagée par tous les appelants
    if (!this.settled) {
      this.settled = new Promise(resolve => {
        this.eventEmitter.once('terminal', resolve);
      });
    }
    return this.settled;
  }

  /**
   * Annule le job : les segments en file ne partent plus et les résultats
   * des appels en cours sont ignorés.
   */
  public cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.pool.close();
    this.clearWatchdog();

    if (this.job.status === 'processing') {
      this.fail(toErrorInfo(new JobCancelledError(this.job.id)));
    }
  }

  private recordResult(index: number, text: string): void {
    if (this.isTerminal || this.cancelled) {
      debugLog(`Job ${this.job.id}: résultat du segment ${index} ignoré (statut ${this.job.status})`);
      return;
    }
    if (index < 0 || index >= this.job.totalCount || this.job.results.has(index)) {
      debugLog(`Job ${this.job.id}: résultat du segment ${index} ignoré`);
      return;
    }

    this.job.results.set(index, text);
    this.job.completedCount += 1;
    this.touch();
    this.armWatchdog();
    this.eventEmitter.emit('progress', this.snapshot());

    if (this.job.completedCount === this.job.totalCount) {
      this.complete();
    }
  }

  private recordFailure(index: number, error: unknown): void {
    if (this.isTerminal || error instanceof JobCancelledError) {
      return;
    }
    this.fail({ ...toErrorInfo(error), segmentIndex: index });
  }

  private complete(): void {
    let resultText: string;
    try {
      resultText = reassembleText(this.job.segments, this.job.results);
    } catch (error) {
      this.fail(toErrorInfo(error));
      return;
    }

    this.job.resultText = resultText;
    this.transition('completed');
    this.finish();
    infoLog(`Job ${this.job.id}: traduction terminée (${resultText.length} caractères)`);
  }

  private fail(error: JobErrorInfo): void {
    if (this.isTerminal) return;

    this.job.error = error;
    this.transition('failed');
    this.pool.close();
    this.finish();
    errorLog(`Job ${this.job.id} en échec [${error.code}]:`, error.message);
  }

  private finish(): void {
    this.clearWatchdog();
    this.job.finishedAt = this.job.updatedAt;
    const snapshot = this.snapshot();
    this.eventEmitter.emit('progress', snapshot);
    this.eventEmitter.emit('terminal', snapshot);
  }

  private transition(next: JobStatus): void {
    const current = this.job.status;
    if (!ALLOWED_TRANSITIONS[current].includes(next)) {
      throw new Error(`Transition interdite pour le job ${this.job.id}: ${current} -> ${next}`);
    }
    this.job.status = next;
    this.touch();
  }

  private touch(): void {
    this.job.updatedAt = new Date();
  }

  // Sans progression pendant stallTimeoutMs, le job passe en échec
  private armWatchdog(): void {
    this.clearWatchdog();
    this.watchdog = setTimeout(() => {
      this.fail(toErrorInfo(new JobTimeoutError(this.job.id, this.options.stallTimeoutMs)));
    }, this.options.stallTimeoutMs);
    this.watchdog.unref();
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = undefined;
    }
  }
}
