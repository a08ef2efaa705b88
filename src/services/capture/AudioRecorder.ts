export interface RealtimeStreamOptions {
  sampleRate: number;
  chunkDurationMs: number;
  /** Receives LINEAR16 mono audio, one chunk per `chunkDurationMs`. */
  onChunk: (chunk: Buffer) => void;
  onWarning?: (detail: string) => void;
}

export interface AudioRecorder {
  isRecording(): boolean;
  startStreaming(options: RealtimeStreamOptions): Promise<void>;
  stop(): Promise<void>;
}
