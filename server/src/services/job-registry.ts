import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../core/errors';
import { debugLog, infoLog } from '../utils/logger';
import type { JobCoordinator } from './job-coordinator';

export interface JobRegistryOptions {
  retentionMs: number;
}

/**
 * Table des jobs partagée par tout le processus. Chaque job n'a qu'un seul
 * écrivain (son coordinateur) ; le suivi de progression lit des copies.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, JobCoordinator>();
  private sweeper?: NodeJS.Timeout;

  constructor(private readonly options: JobRegistryOptions) {}

  public get size(): number {
    return this.jobs.size;
  }

  public create(factory: (jobId: string) => JobCoordinator): string {
    let jobId = uuidv4();
    while (this.jobs.has(jobId)) {
      jobId = uuidv4();
    }
    this.jobs.set(jobId, factory(jobId));
    debugLog(`Job ${jobId} enregistré (${this.jobs.size} actifs)`);
    return jobId;
  }

  public find(jobId: string): JobCoordinator | undefined {
    return this.jobs.get(jobId);
  }

  public get(jobId: string): JobCoordinator {
    const coordinator = this.jobs.get(jobId);
    if (!coordinator) {
      throw new NotFoundError(jobId);
    }
    return coordinator;
  }

  // Supprimer un job en cours l'annule
  public remove(jobId: string): boolean {
    const coordinator = this.jobs.get(jobId);
    if (!coordinator) {
      return false;
    }
    coordinator.cancel();
    this.jobs.delete(jobId);
    debugLog(`Job ${jobId} supprimé`);
    return true;
  }

  /**
   * Retire les jobs terminés depuis plus de `retentionMs`, ainsi que les jobs
   * jamais démarrés créés depuis plus de `retentionMs`.
   */
  public sweep(now: Date = new Date()): number {
    let evicted = 0;
    for (const [jobId, coordinator] of this.jobs) {
      const reference = coordinator.finishedAt
        ?? (coordinator.status === 'queued' ? coordinator.createdAt : undefined);
      if (reference && now.getTime() - reference.getTime() >= this.options.retentionMs) {
        this.remove(jobId);
        evicted++;
      }
    }
    if (evicted > 0) {
      infoLog(`Nettoyage: ${evicted} job(s) expiré(s) supprimé(s)`);
    }
    return evicted;
  }

  public startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  public stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  public stop(): void {
    this.stopSweeper();
    for (const jobId of [...this.jobs.keys()]) {
      this.remove(jobId);
    }
  }
}
