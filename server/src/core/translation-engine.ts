import axios, { type AxiosInstance } from 'axios';
import CircuitBreaker from 'opossum';
import { z } from 'zod';
import { debugLog, warnLog } from '../utils/logger';
import { TranslationError } from './errors';
import type { Translator } from '../types/translation';

export interface TranslationEngineConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  resetTimeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable()
        })
      })
    )
    .min(1)
});

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 8000;
const DEFAULT_RESET_TIMEOUT_MS = 45000;
// Attente entre deux essais pendant que le circuit est semi-ouvert
const HALF_OPEN_POLL_MS = 1000;

export function buildMessages(text: string, context: string, instructions: string): ChatMessage[] {
  const user = context
    ? 'This passage continues a longer document. The source text that precedes it is given ' +
      'for context only and must not be translated.\n\n' +
      `Context:\n${context}\n\nText to translate:\n${text}`
    : `Text to translate:\n${text}`;

  return [
    { role: 'system', content: instructions },
    { role: 'user', content: user }
  ];
}

function isRetryableStatus(status: number | undefined): boolean {
  // Pas de réponse (réseau, timeout) : on réessaie
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Client d'un service de traduction compatible avec l'API chat/completions,
 * protégé par un circuit breaker.
 */
export class TranslationEngine implements Translator {
  private readonly circuitBreaker: CircuitBreaker<[ChatMessage[]], string>;
  private readonly http: AxiosInstance;
  private readonly resetTimeoutMs: number;
  private openedAt?: number;

  constructor(private readonly config: TranslationEngineConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create();
    this.resetTimeoutMs = config.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS;
    this.circuitBreaker = this.initializeCircuitBreaker();

    // Événements du Circuit Breaker
    this.circuitBreaker.on('timeout', () => debugLog('Timeout de la traduction'));
    this.circuitBreaker.on('reject', () => debugLog('Circuit ouvert - requête rejetée'));
    this.circuitBreaker.on('open', () => {
      this.openedAt = Date.now();
      warnLog('Circuit ouvert - trop d\'erreurs');
    });
    this.circuitBreaker.on('halfOpen', () => debugLog('Circuit semi-ouvert - test de reconnexion'));
    this.circuitBreaker.on('close', () => debugLog('Circuit fermé - fonctionnement normal'));
  }

  private initializeCircuitBreaker(): CircuitBreaker<[ChatMessage[]], string> {
    return new CircuitBreaker((messages: ChatMessage[]) => this.chatCompletion(messages), {
      timeout: this.config.timeoutMs * 2,
      errorThresholdPercentage: 40,
      resetTimeout: this.resetTimeoutMs,
      volumeThreshold: 3,
      // Les erreurs définitives (requête invalide, clé refusée) n'ouvrent pas le circuit
      errorFilter: (error: unknown) => error instanceof TranslationError && !error.retryable
    });
  }

  private async chatCompletion(messages: ChatMessage[]): Promise<string> {
    try {
      debugLog('Requête de traduction', {
        model: this.config.model,
        promptLength: messages.reduce((total, message) => total + message.content.length, 0)
      });

      const response = await this.http.post(
        `${this.config.apiUrl}/chat/completions`,
        {
          model: this.config.model,
          messages,
          temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS
        },
        {
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`
          },
          timeout: this.config.timeoutMs
        }
      );

      const parsed = completionSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new TranslationError('Réponse invalide du service de traduction', { cause: parsed.error });
      }

      const content = parsed.data.choices[0].message.content?.trim();
      if (!content) {
        throw new TranslationError('Le service de traduction a renvoyé un texte vide');
      }
      return content;
    } catch (error) {
      if (error instanceof TranslationError) throw error;

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new TranslationError(
          status === undefined
            ? `Requête de traduction échouée: ${error.message}`
            : `Requête de traduction échouée (HTTP ${status})`,
          { statusCode: status, retryable: isRetryableStatus(status), cause: error }
        );
      }
      throw new TranslationError(
        error instanceof Error ? error.message : 'Erreur inconnue du service de traduction',
        { cause: error }
      );
    }
  }

  public async translate(text: string, context: string, instructions: string): Promise<string> {
    try {
      return await this.circuitBreaker.fire(buildMessages(text, context, instructions));
    } catch (error) {
      if (error instanceof TranslationError) throw error;
      if (hasCode(error, 'EOPENBREAKER')) {
        throw new TranslationError('Service de traduction indisponible (circuit ouvert)', {
          circuitOpen: true,
          retryAfterMs: this.retryAfterMs(),
          cause: error
        });
      }
      if (hasCode(error, 'ETIMEDOUT')) {
        throw new TranslationError('Délai dépassé pour la requête de traduction', { cause: error });
      }
      throw new TranslationError(
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
  }

  /**
   * Temps restant avant que le circuit ne passe en semi-ouvert. Une fois
   * semi-ouvert, un seul appel de test passe : les autres réessaient
   * après un court délai.
   */
  private retryAfterMs(): number {
    if (this.circuitBreaker.opened && this.openedAt !== undefined) {
      const remaining = this.openedAt + this.resetTimeoutMs - Date.now();
      if (remaining > 0) return remaining;
    }
    return Math.min(HALF_OPEN_POLL_MS, this.resetTimeoutMs);
  }

  public get circuitOpen(): boolean {
    return this.circuitBreaker.opened;
  }

  public shutdown(): void {
    this.circuitBreaker.shutdown();
  }
}
