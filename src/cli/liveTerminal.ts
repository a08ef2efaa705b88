#!/usr/bin/env node
import { resolveConfig, validateConfig } from '../config';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { LiveTranscriptionSession } from '../core/LiveTranscriptionSession';
import { StructuredLogger } from '../logging/StructuredLogger';
import { GoogleSpeechRecognizer } from '../services/asr/GoogleSpeechRecognizer';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { StreamTerminalSurface } from '../ui/TerminalSurface';
import { formatBanner, formatFinalReport } from './finalReport';

const DEFAULT_COLUMNS = 80;

const main = async (): Promise<number> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, config.consoleLogLevel);
  logger.info('live-stt starting', {
    logPath: logger.getLogPath(),
    languageCode: config.languageCode,
    presentationMode: config.presentationMode
  });

  await runStartupChecks(config, logger);

  const recognizer = new GoogleSpeechRecognizer(logger);
  const session = new LiveTranscriptionSession(
    {
      recorder: new FfmpegRecorder(
        {
          ffmpegBin: config.ffmpegBin,
          inputFormat: config.ffmpegInputFormat,
          inputDevice: config.ffmpegInputDevice
        },
        logger
      ),
      recognizer,
      surface: new StreamTerminalSurface(process.stdout),
      viewport: () => ({
        columns: process.stdout.columns ?? DEFAULT_COLUMNS,
        rows: process.stdout.rows
      })
    },
    config,
    logger
  );

  // Console echoes share the terminal with the live view.
  logger.onBeforeConsoleEcho(() => session.detachView());

  let interrupts = 0;
  process.on('SIGINT', () => {
    interrupts += 1;
    if (interrupts > 1) {
      process.stderr.write('\nExiting.\n');
      process.exit(130);
    }

    logger.info('Interrupt received; stopping session');
    void session.stop();
  });

  process.stdout.write(formatBanner(config.presentationMode));

  const outcome = await session.run();
  process.stdout.write(formatFinalReport(outcome.transcript));

  if (outcome.error) {
    process.stderr.write(`\n[error] ${outcome.error.message}\n`);
  }

  await recognizer.close().catch((error: unknown) => {
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn('Recognition client did not close cleanly', { detail });
  });
  await logger.flush();

  return outcome.error ? 1 : 0;
};

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${detail}\n`);
    process.exit(1);
  });
