import { LiveTranscriptionSession, SessionOptions } from '../../src/core/LiveTranscriptionSession';
import { SessionState } from '../../src/types';
import {
  FakeRecognitionStream,
  FakeRecognizer,
  FakeRecorder,
  flushMicrotasks,
  RecordingSurface
} from '../helpers/fakes';

const OPTIONS: SessionOptions = {
  languageCode: 'en-US',
  sampleRate: 16000,
  chunksPerSecond: 10,
  automaticPunctuation: true,
  recognitionModel: undefined,
  presentationMode: 'multiLineWrap',
  removeFillers: true,
  drainTimeoutMs: 1000
};

describe('LiveTranscriptionSession', () => {
  let recorder: FakeRecorder;
  let recognizer: FakeRecognizer;
  let surface: RecordingSurface;

  const createSession = (
    options: Partial<SessionOptions> = {},
    stream = new FakeRecognitionStream()
  ): LiveTranscriptionSession => {
    recognizer = new FakeRecognizer(stream);
    return new LiveTranscriptionSession(
      {
        recorder,
        recognizer,
        surface,
        viewport: () => ({ columns: 80 })
      },
      { ...OPTIONS, ...options }
    );
  };

  beforeEach(() => {
    recorder = new FakeRecorder();
    surface = new RecordingSurface();
  });

  it('forwards audio, applies results and returns the cleaned transcript', async () => {
    const session = createSession();
    const states: SessionState[] = [];
    session.on('stateChanged', (state) => states.push(state));

    const running = session.run();
    await flushMicrotasks();

    recorder.emitChunk(Buffer.from([1, 2]));
    recorder.emitChunk(Buffer.alloc(0));
    recognizer.stream.deliver(
      { text: 'testing um one', isFinal: false },
      { text: 'testing one', isFinal: true },
      { text: 'two three', isFinal: false },
      { text: 'testing one two three', isFinal: true }
    );

    await session.stop();
    const outcome = await running;

    expect(outcome).toEqual({
      transcript: 'testing one two three',
      segments: ['testing one', 'two three']
    });
    expect(recognizer.stream.written).toEqual([Buffer.from([1, 2])]);
    expect(recognizer.stream.outboundEnded).toBe(true);
    expect(recorder.options?.chunkDurationMs).toBe(100);
    expect(recorder.options?.sampleRate).toBe(16000);
    expect(states.map((state) => state.stage)).toEqual(['listening', 'stopped']);
    expect(session.getState().stage).toBe('stopped');
  });

  it('opens the recognition stream with the session settings', async () => {
    const session = createSession({ languageCode: 'en-GB', recognitionModel: 'latest_long' });

    const running = session.run();
    await session.stop();
    await running;

    expect(recognizer.configs).toEqual([
      {
        languageCode: 'en-GB',
        sampleRate: 16000,
        automaticPunctuation: true,
        interimResults: true,
        model: 'latest_long'
      }
    ]);
  });

  it('ignores audio that arrives after stop', async () => {
    const session = createSession();
    const running = session.run();
    await flushMicrotasks();

    await session.stop();
    recorder.emitChunk(Buffer.from([9]));
    await running;

    expect(recognizer.stream.written).toEqual([]);
    expect(recorder.stopCalls).toBe(1);
  });

  it('finishes when the recognizer closes the stream on its own', async () => {
    const session = createSession();
    const running = session.run();
    await flushMicrotasks();

    recognizer.stream.deliver({ text: 'hello world', isFinal: true });
    recognizer.stream.finish();
    const outcome = await running;

    expect(outcome.transcript).toBe('hello world');
    expect(recorder.stopCalls).toBe(1);
    expect(recorder.isRecording()).toBe(false);
  });

  it('reports a stream error on the outcome and keeps the transcript so far', async () => {
    const session = createSession();
    const running = session.run();
    await flushMicrotasks();

    recognizer.stream.deliver({ text: 'first words', isFinal: true });
    recognizer.stream.emit('error', new Error('Exceeded maximum allowed stream duration'));
    const outcome = await running;

    expect(outcome.transcript).toBe('first words');
    expect(outcome.error?.message).toBe('Exceeded maximum allowed stream duration');
    expect(session.getState()).toEqual({
      stage: 'stopped',
      detail: 'Exceeded maximum allowed stream duration'
    });
  });

  it('closes a stream that does not drain within the timeout', async () => {
    const session = createSession({ drainTimeoutMs: 10 }, new FakeRecognitionStream(false));
    const running = session.run();
    await flushMicrotasks();

    await session.stop();
    const outcome = await running;

    expect(recognizer.stream.outboundEnded).toBe(true);
    expect(recognizer.stream.destroyed).toBe(true);
    expect(outcome.transcript).toBe('');
  });

  it('fails before processing when the microphone cannot be opened', async () => {
    recorder = new FakeRecorder(new Error('Microphone permission denied.'));
    const session = createSession();

    await expect(session.run()).rejects.toThrow('Microphone permission denied.');
    expect(recognizer.stream.destroyed).toBe(true);
    expect(session.getState().stage).toBe('stopped');
  });

  it('does not draw or request interim results in final-only mode', async () => {
    const session = createSession({ presentationMode: 'finalOnly' });
    const running = session.run();
    await flushMicrotasks();

    recognizer.stream.deliver({ text: 'only the final', isFinal: true });
    await session.stop();
    const outcome = await running;

    expect(recognizer.configs[0]?.interimResults).toBe(false);
    expect(surface.plans).toEqual([]);
    expect(outcome.transcript).toBe('only the final');
  });

  it('moves below the live view once the session ends', async () => {
    const session = createSession();
    const running = session.run();
    await flushMicrotasks();

    recognizer.stream.deliver({ text: 'hello', isFinal: false });
    await session.stop();
    await running;

    expect(surface.plans).toEqual([
      [{ kind: 'write', text: 'hello' }],
      [{ kind: 'write', text: '\n' }]
    ]);
  });

  it('starts a fresh view after being detached from the terminal', async () => {
    const session = createSession();
    const running = session.run();
    await flushMicrotasks();

    recognizer.stream.deliver({ text: 'hello', isFinal: false });
    session.detachView();
    recognizer.stream.deliver({ text: 'hello there', isFinal: false });
    await session.stop();
    await running;

    expect(surface.plans).toEqual([
      [{ kind: 'write', text: 'hello' }],
      [{ kind: 'write', text: '\n' }],
      [{ kind: 'write', text: 'hello there' }],
      [{ kind: 'write', text: '\n' }]
    ]);
  });

  it('re-emits audio warnings from the recorder', async () => {
    const session = createSession();
    const warnings: string[] = [];
    session.on('audioWarning', (detail) => warnings.push(detail));

    const running = session.run();
    await flushMicrotasks();
    recorder.emitWarning('input overflow');
    await session.stop();
    await running;

    expect(warnings).toEqual(['input overflow']);
  });

  it('cannot be run twice', async () => {
    const session = createSession();
    const running = session.run();
    await session.stop();
    await running;

    await expect(session.run()).rejects.toThrow('Session has already been started');
  });
});
