import type { ErrorCode } from '../core/errors';
import type { Segment } from './segmentation';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface SourceDocument {
  text: string;
  instructions: string;
  filename: string;
  targetLanguage: string;
}

export interface JobErrorInfo {
  code: ErrorCode;
  message: string;
  segmentIndex?: number;
}

export interface Job {
  id: string;
  document: SourceDocument;
  segments: readonly Segment[];
  results: Map<number, string>;
  status: JobStatus;
  completedCount: number;
  totalCount: number;
  error?: JobErrorInfo;
  resultText?: string;
  createdAt: Date;
  updatedAt: Date;
  finishedAt?: Date;
}

export interface JobSnapshot {
  id: string;
  status: JobStatus;
  progress: number;
  completedCount: number;
  totalCount: number;
  error?: JobErrorInfo;
  createdAt: string;
  updatedAt: string;
}

export interface Translator {
  translate(text: string, context: string, instructions: string): Promise<string>;
}
