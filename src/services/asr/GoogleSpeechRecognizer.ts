import type { Duplex } from 'node:stream';
import { SpeechClient, protos } from '@google-cloud/speech';
import { StructuredLogger } from '../../logging/StructuredLogger';
import {
  parseStreamingResponse,
  RecognitionBackend,
  RecognitionStream,
  RecognitionStreamConfig
} from './RecognitionBackend';

type StreamingRecognitionConfig = protos.google.cloud.speech.v1.IStreamingRecognitionConfig;

const AudioEncoding = protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding;

export const buildStreamingConfig = (
  config: RecognitionStreamConfig
): StreamingRecognitionConfig => ({
  config: {
    encoding: AudioEncoding.LINEAR16,
    sampleRateHertz: config.sampleRate,
    languageCode: config.languageCode,
    enableAutomaticPunctuation: config.automaticPunctuation,
    ...(config.model ? { model: config.model } : {})
  },
  interimResults: config.interimResults,
  // Keep listening across pauses until the client half-closes.
  singleUtterance: false
});

class GoogleRecognitionStream extends RecognitionStream {
  private ended = false;
  private responses = 0;

  public constructor(
    private readonly duplex: Duplex,
    private readonly logger?: StructuredLogger
  ) {
    super();

    duplex.on('data', (response: unknown) => {
      this.responses += 1;
      for (const result of parseStreamingResponse(response)) {
        this.emit('result', result);
      }
    });

    duplex.on('error', (error: Error) => {
      this.logger?.error('Recognition stream failed', {
        detail: error.message,
        responses: this.responses
      });
      this.emit('error', error);
      this.finish();
    });

    duplex.on('end', () => {
      this.finish();
    });

    duplex.on('close', () => {
      this.finish();
    });
  }

  public write(chunk: Buffer): void {
    if (this.ended || this.duplex.writableEnded) {
      return;
    }

    this.duplex.write({ audioContent: chunk });
  }

  public end(): void {
    if (this.duplex.writableEnded) {
      return;
    }

    this.duplex.end();
  }

  public destroy(): void {
    this.duplex.destroy();
    this.finish();
  }

  private finish(): void {
    if (this.ended) {
      return;
    }

    this.ended = true;
    this.logger?.info('Recognition stream ended', { responses: this.responses });
    this.emit('end');
  }
}

export class GoogleSpeechRecognizer implements RecognitionBackend {
  private readonly client: SpeechClient;

  public constructor(
    private readonly logger?: StructuredLogger,
    client?: SpeechClient
  ) {
    this.client = client ?? new SpeechClient();
  }

  public openStream(config: RecognitionStreamConfig): RecognitionStream {
    const streamingConfig = buildStreamingConfig(config);
    const duplex = this.client.streamingRecognize(streamingConfig);

    this.logger?.info('Recognition stream opened', {
      languageCode: config.languageCode,
      sampleRate: config.sampleRate,
      interimResults: config.interimResults,
      automaticPunctuation: config.automaticPunctuation,
      model: config.model
    });

    return new GoogleRecognitionStream(duplex, this.logger);
  }

  public async close(): Promise<void> {
    await this.client.close();
  }
}
