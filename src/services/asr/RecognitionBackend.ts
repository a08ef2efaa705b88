import { EventEmitter } from 'node:events';
import { RecognitionResult } from '../../types';

export interface RecognitionStreamConfig {
  languageCode: string;
  sampleRate: number;
  automaticPunctuation: boolean;
  interimResults: boolean;
  model?: string;
}

export declare interface RecognitionStream {
  on(event: 'result', listener: (result: RecognitionResult) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'end', listener: () => void): this;
  once(event: 'end', listener: () => void): this;
}

/**
 * One streaming recognition session. Audio goes in through `write`, `end`
 * half-closes the outbound side, and results arrive as `result` events until
 * `end` (or `error`).
 */
export abstract class RecognitionStream extends EventEmitter {
  public abstract write(chunk: Buffer): void;
  public abstract end(): void;
  public abstract destroy(): void;
}

export interface RecognitionBackend {
  openStream(config: RecognitionStreamConfig): RecognitionStream;
  close?: () => Promise<void>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Extracts the top alternative of every result in a streaming response.
 * Results without alternatives or transcript text are skipped.
 */
export const parseStreamingResponse = (response: unknown): RecognitionResult[] => {
  if (!isRecord(response) || !Array.isArray(response.results)) {
    return [];
  }

  const parsed: RecognitionResult[] = [];

  for (const result of response.results) {
    if (!isRecord(result) || !Array.isArray(result.alternatives)) {
      continue;
    }

    const top: unknown = result.alternatives[0];
    if (!isRecord(top) || typeof top.transcript !== 'string') {
      continue;
    }

    parsed.push({ text: top.transcript, isFinal: result.isFinal === true });
  }

  return parsed;
};
