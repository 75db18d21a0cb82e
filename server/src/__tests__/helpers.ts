import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig
} from 'axios';

import type { Segment } from '../types/segmentation';
import type { Translator } from '../types/translation';

export interface TranslateCall {
  text: string;
  context: string;
  instructions: string;
}

type Behaviour = (call: TranslateCall, attempt: number) => string | Promise<string>;

/**
 * Traducteur en mémoire : enregistre chaque appel et délègue la réponse à
 * `behaviour`, qui reçoit aussi le numéro de tentative pour ce texte.
 */
export class StubTranslator implements Translator {
  readonly calls: TranslateCall[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(private readonly behaviour: Behaviour = call => `[${call.text}]`) {}

  async translate(text: string, context: string, instructions: string): Promise<string> {
    const call = { text, context, instructions };
    this.calls.push(call);
    const attempt = (this.attempts.get(text) ?? 0) + 1;
    this.attempts.set(text, attempt);
    return this.behaviour(call, attempt);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export function segment(index: number, text: string, context = ''): Segment {
  return { index, text, context, leading: '', separator: '' };
}

type HttpHandler = (config: InternalAxiosRequestConfig) => AxiosResponse;

export function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

export function completion(config: InternalAxiosRequestConfig, content: string | null): AxiosResponse {
  return respond(config, 200, { choices: [{ message: { role: 'assistant', content } }] });
}

export function httpError(config: InternalAxiosRequestConfig, status: number): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config,
    undefined,
    respond(config, status, { error: { message: 'refused' } })
  );
}

// Instance axios dont l'adaptateur répond en mémoire, sans réseau
export function fakeHttp(handler: HttpHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async config => {
      requests.push(config);
      return handler(config);
    }
  });
  return { http, requests };
}
