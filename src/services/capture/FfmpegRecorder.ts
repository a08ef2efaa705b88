import { ChildProcess, spawn } from 'node:child_process';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioRecorder, RealtimeStreamOptions } from './AudioRecorder';
import { bytesPerChunk, FLOAT32_BYTES_PER_SAMPLE, float32ToInt16Le } from './pcm';

const START_STABILITY_DELAY_MS = 300;

export interface FfmpegRecorderOptions {
  ffmpegBin: string;
  inputFormat: string;
  inputDevice: string;
  startStabilityDelayMs?: number;
}

const normalizeMicError = (raw: string, inputDevice: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access and retry.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return `Microphone input device '${inputDevice}' is unavailable. Verify LIVE_STT_FFMPEG_FORMAT and LIVE_STT_FFMPEG_INPUT.`;
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

/**
 * Captures mono float32 audio through ffmpeg and hands out fixed-size LINEAR16
 * chunks. Anything ffmpeg prints on stderr once capture is running (buffer
 * overruns, xruns) is reported as a non-fatal warning.
 */
export class FfmpegRecorder implements AudioRecorder {
  private process: ChildProcess | undefined;
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private chunkByteSize = 0;
  private onChunk: ((chunk: Buffer) => void) | undefined;
  private onWarning: ((detail: string) => void) | undefined;

  public constructor(
    private readonly options: FfmpegRecorderOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public isRecording(): boolean {
    return Boolean(this.process);
  }

  public async startStreaming(options: RealtimeStreamOptions): Promise<void> {
    if (this.process) {
      throw new Error('Recorder is already active');
    }

    if (options.chunkDurationMs < 20 || options.chunkDurationMs > 2000) {
      throw new Error('chunkDurationMs must be between 20 and 2000.');
    }

    this.onChunk = options.onChunk;
    this.onWarning = options.onWarning;
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.chunkByteSize = bytesPerChunk(
      options.sampleRate,
      options.chunkDurationMs,
      FLOAT32_BYTES_PER_SAMPLE
    );

    const args = [
      '-hide_banner',
      '-loglevel',
      'warning',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.inputDevice,
      '-ac',
      '1',
      '-ar',
      String(options.sampleRate),
      '-f',
      'f32le',
      '-acodec',
      'pcm_f32le',
      'pipe:1'
    ];

    const ffmpeg = spawn(this.options.ffmpegBin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', () => {
      if (this.process === ffmpeg) {
        this.process = undefined;
      }
    });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      if (this.process !== ffmpeg) {
        stderrLog += text;
        return;
      }

      this.reportWarnings(text);
    });

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      this.handleAudioData(Buffer.from(chunk));
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog, this.options.inputDevice)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, this.options.startStabilityDelayMs ?? START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(
          new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`, this.options.inputDevice))
        );
      });
    });

    if (stderrLog.trim()) {
      this.reportWarnings(stderrLog);
    }

    this.logger?.info('Recorder started (stream mode)', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: options.sampleRate,
      chunkByteSize: this.chunkByteSize
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      current.once('close', (code) => {
        this.process = undefined;
        if (code === 0 || code === 255 || code === null) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.once('error', (error) => {
        this.process = undefined;
        reject(error);
      });

      current.kill('SIGINT');
    });

    this.flushPendingTailChunk();
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.onChunk = undefined;
    this.onWarning = undefined;

    this.logger?.info('Recorder stopped');
  }

  private reportWarnings(text: string): void {
    for (const line of text.split(/\r?\n/)) {
      const detail = line.trim();
      if (!detail) {
        continue;
      }

      this.logger?.warn('Audio warning', { detail });
      this.onWarning?.(detail);
    }
  }

  private emitChunk(floatChunk: Buffer, label: string): void {
    if (!this.onChunk) {
      return;
    }

    try {
      this.onChunk(float32ToInt16Le(floatChunk));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Recorder ${label} callback failed`, { detail });
    }
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.onChunk || chunk.length === 0 || this.chunkByteSize <= 0) {
      return;
    }

    this.pendingChunks.push(Buffer.from(chunk));
    this.pendingBytes += chunk.length;

    while (this.pendingBytes >= this.chunkByteSize) {
      const nextChunk = this.readPendingBytes(this.chunkByteSize);
      if (!nextChunk) {
        break;
      }

      this.emitChunk(nextChunk, 'chunk');
    }
  }

  private flushPendingTailChunk(): void {
    const tailBytes = this.pendingBytes - (this.pendingBytes % FLOAT32_BYTES_PER_SAMPLE);
    if (!this.onChunk || tailBytes < Math.floor(this.chunkByteSize / 2)) {
      return;
    }

    const tail = this.readPendingBytes(tailBytes);
    if (!tail) {
      return;
    }

    this.emitChunk(tail, 'tail chunk');
  }

  private readPendingBytes(byteCount: number): Buffer | undefined {
    if (byteCount <= 0 || byteCount > this.pendingBytes) {
      return undefined;
    }

    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
