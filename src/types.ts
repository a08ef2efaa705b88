export type PresentationMode = 'multiLineWrap' | 'singleLineTail' | 'finalOnly';
export type ConsoleLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type SessionStage = 'listening' | 'stopped';

export interface SessionState {
  stage: SessionStage;
  detail?: string;
}

export interface RecognitionResult {
  text: string;
  isFinal: boolean;
}

export interface Viewport {
  columns: number;
  rows?: number;
}

export interface SessionOutcome {
  transcript: string;
  segments: string[];
  error?: Error;
}

export interface AppConfig {
  languageCode: string;
  sampleRate: number;
  chunksPerSecond: number;
  removeFillers: boolean;
  presentationMode: PresentationMode;
  automaticPunctuation: boolean;
  recognitionModel?: string;
  ffmpegBin: string;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  drainTimeoutMs: number;
  logDir: string;
  consoleLogLevel: ConsoleLogLevel;
  credentialsPath?: string;
}
