import fs from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

const assertPathExists = (absolutePath: string, label: string, hint: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. ${hint}`);
  }
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger
): Promise<void> => {
  logger.info('Running startup checks');

  await runCommand(config.ffmpegBin, ['-version'], { timeoutMs: 8000 }).catch(
    (error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(
        `ffmpeg is required for microphone capture (${detail}). Install it or set LIVE_STT_FFMPEG_BIN.`
      );
    }
  );

  if (config.credentialsPath) {
    assertPathExists(
      path.resolve(config.credentialsPath),
      'Google credentials file',
      'Update GOOGLE_APPLICATION_CREDENTIALS.'
    );
  } else {
    logger.info('GOOGLE_APPLICATION_CREDENTIALS is not set; relying on application default credentials');
  }

  logger.info('Startup checks completed successfully');
};
