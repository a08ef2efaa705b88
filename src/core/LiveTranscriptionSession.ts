import { EventEmitter } from 'node:events';
import { chunkDurationMs as resolveChunkDurationMs } from '../config';
import { StructuredLogger } from '../logging/StructuredLogger';
import { RecognitionBackend, RecognitionStream } from '../services/asr/RecognitionBackend';
import { AudioRecorder } from '../services/capture/AudioRecorder';
import { AudioChunkQueue } from '../services/queue/AudioChunkQueue';
import { TextNormalizer } from '../services/text/TextNormalizer';
import { TranscriptStore } from '../services/transcript/TranscriptStore';
import { AppConfig, RecognitionResult, SessionOutcome, SessionState, Viewport } from '../types';
import { TerminalSurface } from '../ui/TerminalSurface';
import { ViewportRenderer } from '../ui/ViewportRenderer';
import { RecognitionResultRouter } from './RecognitionResultRouter';

export type SessionOptions = Pick<
  AppConfig,
  | 'languageCode'
  | 'sampleRate'
  | 'chunksPerSecond'
  | 'automaticPunctuation'
  | 'recognitionModel'
  | 'presentationMode'
  | 'removeFillers'
  | 'drainTimeoutMs'
>;

export interface SessionDependencies {
  recorder: AudioRecorder;
  recognizer: RecognitionBackend;
  surface: TerminalSurface;
  viewport: () => Viewport;
}

export declare interface LiveTranscriptionSession {
  on(event: 'stateChanged', listener: (state: SessionState) => void): this;
  on(event: 'audioWarning', listener: (detail: string) => void): this;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * One listening session: microphone chunks flow through a hand-off queue to
 * the recognition stream, and results flow back through the router to the
 * terminal. Everything the session mutates is created here and discarded with it.
 */
export class LiveTranscriptionSession extends EventEmitter {
  private state: SessionState = { stage: 'listening' };
  private readonly queue = new AudioChunkQueue<Buffer>();
  private readonly store: TranscriptStore;
  private readonly renderer: ViewportRenderer;
  private readonly router: RecognitionResultRouter;
  private stream: RecognitionStream | undefined;
  private started = false;
  private acceptingAudio = false;
  private streamEnded = false;
  private failure: Error | undefined;
  private stopPromise: Promise<void> | undefined;
  private drainTimer: NodeJS.Timeout | undefined;
  private forwardedChunks = 0;
  private audioWarnings = 0;

  public constructor(
    private readonly deps: SessionDependencies,
    private readonly options: SessionOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();

    const normalizer = new TextNormalizer({ removeFillers: options.removeFillers });
    this.store = new TranscriptStore(normalizer);
    this.renderer = new ViewportRenderer(deps.surface, normalizer, {
      mode: options.presentationMode
    });
    this.router = new RecognitionResultRouter(
      {
        store: this.store,
        renderer: this.renderer,
        normalizer,
        viewport: deps.viewport
      },
      logger
    );
  }

  public getState(): SessionState {
    return this.state;
  }

  /**
   * Leaves the live view in place and starts the next one on a fresh line.
   * Call before anything else writes to the terminal the view is drawn on.
   */
  public detachView(): void {
    this.renderer.finish();
  }

  /**
   * Opens the recognition stream and the microphone, then resolves once the
   * stream has ended. Failures while opening either are thrown before any
   * result is processed; a stream error later ends the session and is
   * reported on the outcome.
   */
  public async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error('Session has already been started');
    }
    this.started = true;

    const stream = this.deps.recognizer.openStream({
      languageCode: this.options.languageCode,
      sampleRate: this.options.sampleRate,
      automaticPunctuation: this.options.automaticPunctuation,
      interimResults: this.options.presentationMode !== 'finalOnly',
      model: this.options.recognitionModel
    });
    this.stream = stream;

    const ended = new Promise<void>((resolve) => {
      stream.once('end', () => {
        this.streamEnded = true;
        this.clearDrainTimer();
        resolve();
      });
    });

    stream.on('result', (result) => {
      this.handleResult(result);
    });

    stream.on('error', (error) => {
      this.failure = this.failure ?? error;
      void this.stop();
    });

    const forwarding = this.forwardAudio(stream);
    const chunkDurationMs = resolveChunkDurationMs(this.options);
    this.acceptingAudio = true;

    try {
      await this.deps.recorder.startStreaming({
        sampleRate: this.options.sampleRate,
        chunkDurationMs,
        onChunk: (chunk) => {
          if (!this.acceptingAudio || chunk.length === 0) {
            return;
          }

          this.queue.push(chunk);
        },
        onWarning: (detail) => {
          this.audioWarnings += 1;
          this.emit('audioWarning', detail);
        }
      });
    } catch (error) {
      this.acceptingAudio = false;
      this.queue.close();
      stream.destroy();
      await forwarding;
      this.setState({ stage: 'stopped', detail: 'Audio capture failed to start' });
      throw error;
    }

    if (this.stopPromise) {
      // Interrupted while the microphone was opening.
      await this.deps.recorder.stop().catch((error: unknown) => {
        this.logger?.warn('Recorder stop failed', { detail: toError(error).message });
      });
    } else {
      this.setState({ stage: 'listening', detail: 'Streaming audio' });
      this.logger?.info('Session started', {
        languageCode: this.options.languageCode,
        sampleRate: this.options.sampleRate,
        chunkDurationMs,
        presentationMode: this.options.presentationMode,
        removeFillers: this.options.removeFillers
      });
    }

    await ended;
    await this.stop();
    await forwarding;

    this.renderer.finish();
    this.setState({
      stage: 'stopped',
      detail: this.failure ? this.failure.message : 'Recognition stream closed'
    });

    const outcome: SessionOutcome = {
      transcript: this.store.finalTranscript(),
      segments: this.store.segments(),
      ...(this.failure ? { error: this.failure } : {})
    };

    this.logger?.info('Session finished', {
      segments: outcome.segments.length,
      transcriptLength: outcome.transcript.length,
      forwardedChunks: this.forwardedChunks,
      audioWarnings: this.audioWarnings,
      renderWrites: this.renderer.getWriteCount(),
      commits: this.store.stats(),
      latencySummary: this.router.summarize(),
      failed: Boolean(this.failure)
    });

    return outcome;
  }

  /**
   * Stops intake: no new audio is accepted, the queue is closed so the
   * recognizer sees the end of audio, and results already in flight are
   * still applied until the stream ends or the drain timeout passes.
   */
  public stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }

    return this.stopPromise;
  }

  private async performStop(): Promise<void> {
    this.acceptingAudio = false;

    await this.deps.recorder.stop().catch((error: unknown) => {
      this.logger?.warn('Recorder stop failed', { detail: toError(error).message });
    });

    this.queue.close();

    if (this.streamEnded || !this.stream) {
      return;
    }

    const stream = this.stream;
    this.drainTimer = setTimeout(() => {
      this.drainTimer = undefined;
      if (this.streamEnded) {
        return;
      }

      this.logger?.warn('Recognition stream did not finish draining; closing it', {
        drainTimeoutMs: this.options.drainTimeoutMs
      });
      stream.destroy();
    }, this.options.drainTimeoutMs);
  }

  private async forwardAudio(stream: RecognitionStream): Promise<void> {
    try {
      for await (const chunk of this.queue) {
        stream.write(chunk);
        this.forwardedChunks += 1;
      }
    } finally {
      stream.end();
    }
  }

  private handleResult(result: RecognitionResult): void {
    try {
      this.router.handle(result);
    } catch (error) {
      this.logger?.error('Failed to apply recognition result', {
        detail: toError(error).message,
        isFinal: result.isFinal
      });
    }
  }

  private clearDrainTimer(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = undefined;
    }
  }

  private setState(next: SessionState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}
