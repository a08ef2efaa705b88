import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StructuredLogger } from '../../src/logging/StructuredLogger';

describe('StructuredLogger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'live-stt-logs-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('appends one JSON line per entry to a dated file', async () => {
    const logger = await StructuredLogger.create(path.join(logDir, 'nested'), 'silent');

    logger.info('Session started', { sampleRate: 16000 });
    logger.warn('Audio warning', { detail: 'buffer overrun' });
    await logger.flush();

    const datePrefix = new Date().toISOString().slice(0, 10);
    expect(path.basename(logger.getLogPath())).toBe(`live-stt-${datePrefix}.log`);

    const lines = fs
      .readFileSync(logger.getLogPath(), 'utf8')
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 'info', message: 'Session started', sampleRate: 16000 });
    expect(lines[1]).toMatchObject({ level: 'warn', message: 'Audio warning', detail: 'buffer overrun' });
  });

  it('echoes only entries at or above the console level', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = await StructuredLogger.create(logDir, 'warn');

    logger.debug('Final result committed');
    logger.info('Recorder started');
    logger.warn('Audio warning', { detail: 'xrun' });
    logger.error('Recognition stream failed', { detail: 'quota' });
    await logger.flush();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('[live-stt] Audio warning', { detail: 'xrun' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[live-stt] Recognition stream failed', { detail: 'quota' });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('runs the echo listener only before entries that reach the console', async () => {
    const order: string[] = [];
    jest.spyOn(console, 'warn').mockImplementation(() => {
      order.push('echo');
    });
    const logger = await StructuredLogger.create(logDir, 'warn');
    logger.onBeforeConsoleEcho(() => order.push('listener'));

    logger.info('Recorder started');
    logger.warn('Audio warning', { detail: 'xrun' });
    await logger.flush();

    expect(order).toEqual(['listener', 'echo']);
  });
});
