import os from 'node:os';
import path from 'node:path';
import { AppConfig, ConsoleLogLevel, PresentationMode } from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const optionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const isPresentationMode = (value: string): value is PresentationMode =>
  value === 'multiLineWrap' || value === 'singleLineTail' || value === 'finalOnly';

const isConsoleLogLevel = (value: string): value is ConsoleLogLevel =>
  value === 'debug' ||
  value === 'info' ||
  value === 'warn' ||
  value === 'error' ||
  value === 'silent';

const resolvePresentationMode = (value: string | undefined): PresentationMode =>
  value !== undefined && isPresentationMode(value) ? value : 'multiLineWrap';

const resolveConsoleLogLevel = (value: string | undefined): ConsoleLogLevel =>
  value !== undefined && isConsoleLogLevel(value) ? value : 'warn';

interface CaptureDefaults {
  inputFormat: string;
  inputDevice: string;
}

const getCaptureDefaults = (platform: NodeJS.Platform): CaptureDefaults => {
  if (platform === 'darwin') {
    return { inputFormat: 'avfoundation', inputDevice: ':0' };
  }

  if (platform === 'win32') {
    return { inputFormat: 'dshow', inputDevice: 'audio=Microphone' };
  }

  return { inputFormat: 'pulse', inputDevice: 'default' };
};

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const captureDefaults = getCaptureDefaults(process.platform);

  return {
    languageCode: env.LIVE_STT_LANGUAGE ?? 'en-US',
    sampleRate: parseIntOrDefault(env.LIVE_STT_SAMPLE_RATE, 16000),
    chunksPerSecond: parseIntOrDefault(env.LIVE_STT_CHUNKS_PER_SECOND, 10),
    removeFillers: parseBoolOrDefault(env.LIVE_STT_REMOVE_FILLERS, true),
    presentationMode: resolvePresentationMode(env.LIVE_STT_PRESENTATION),
    automaticPunctuation: parseBoolOrDefault(env.LIVE_STT_PUNCTUATION, true),
    recognitionModel: optionalString(env.LIVE_STT_MODEL),
    ffmpegBin: env.LIVE_STT_FFMPEG_BIN ?? 'ffmpeg',
    ffmpegInputFormat: env.LIVE_STT_FFMPEG_FORMAT ?? captureDefaults.inputFormat,
    ffmpegInputDevice: env.LIVE_STT_FFMPEG_INPUT ?? captureDefaults.inputDevice,
    drainTimeoutMs: parseIntOrDefault(env.LIVE_STT_DRAIN_TIMEOUT_MS, 3000),
    logDir: env.LIVE_STT_LOG_DIR ?? path.join(os.homedir(), '.live-stt', 'logs'),
    consoleLogLevel: resolveConsoleLogLevel(env.LIVE_STT_CONSOLE_LOG_LEVEL),
    credentialsPath: optionalString(env.GOOGLE_APPLICATION_CREDENTIALS)
  };
};

/**
 * Range checks on the resolved config. Enumerated settings resolve to their
 * default when unrecognized, so those are checked against the raw `env`.
 */
export const validateConfig = (
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): string[] => {
  const errors: string[] = [];

  if (!config.languageCode.trim()) {
    errors.push('LIVE_STT_LANGUAGE must not be empty.');
  }

  if (config.sampleRate < 8000 || config.sampleRate > 48000) {
    errors.push('LIVE_STT_SAMPLE_RATE must be between 8000 and 48000 Hz.');
  }

  if (config.chunksPerSecond < 1 || config.chunksPerSecond > 50) {
    errors.push('LIVE_STT_CHUNKS_PER_SECOND must be between 1 and 50.');
  }

  if (env.LIVE_STT_PRESENTATION !== undefined && !isPresentationMode(env.LIVE_STT_PRESENTATION)) {
    errors.push('LIVE_STT_PRESENTATION must be one of: multiLineWrap, singleLineTail, finalOnly.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('LIVE_STT_FFMPEG_BIN must not be empty.');
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('LIVE_STT_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.ffmpegInputDevice.trim()) {
    errors.push('LIVE_STT_FFMPEG_INPUT must not be empty.');
  }

  if (config.drainTimeoutMs < 0 || config.drainTimeoutMs > 30000) {
    errors.push('LIVE_STT_DRAIN_TIMEOUT_MS must be between 0 and 30000 milliseconds.');
  }

  if (!config.logDir.trim()) {
    errors.push('LIVE_STT_LOG_DIR must not be empty.');
  }

  if (
    env.LIVE_STT_CONSOLE_LOG_LEVEL !== undefined &&
    !isConsoleLogLevel(env.LIVE_STT_CONSOLE_LOG_LEVEL)
  ) {
    errors.push('LIVE_STT_CONSOLE_LOG_LEVEL must be one of: debug, info, warn, error, silent.');
  }

  return errors;
};

export const chunkDurationMs = (config: Pick<AppConfig, 'chunksPerSecond'>): number =>
  Math.round(1000 / config.chunksPerSecond);
