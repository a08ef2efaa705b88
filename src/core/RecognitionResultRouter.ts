import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker, LatencySummary } from '../perf/LatencyTracker';
import { TextNormalizer } from '../services/text/TextNormalizer';
import { TranscriptStore } from '../services/transcript/TranscriptStore';
import { RecognitionResult, Viewport } from '../types';
import { ViewportRenderer } from '../ui/ViewportRenderer';

export interface RecognitionResultRouterDependencies {
  store: TranscriptStore;
  renderer: ViewportRenderer;
  normalizer: TextNormalizer;
  viewport: () => Viewport;
  now?: () => number;
}

/**
 * Applies recognition results strictly in delivery order: finals go to the
 * store, interims replace the provisional tail, and every result redraws.
 */
export class RecognitionResultRouter {
  private interimText = '';
  private lastResultAtMs: number | undefined;
  private readonly latencyTracker = new LatencyTracker();
  private readonly now: () => number;

  public constructor(
    private readonly deps: RecognitionResultRouterDependencies,
    private readonly logger?: StructuredLogger
  ) {
    this.now = deps.now ?? Date.now;
  }

  public handle(result: RecognitionResult): void {
    const startedAt = this.now();
    const intervalMs = this.lastResultAtMs === undefined ? 0 : startedAt - this.lastResultAtMs;
    this.lastResultAtMs = startedAt;

    if (result.isFinal) {
      const outcome = this.deps.store.commitFinal(result.text);
      this.interimText = '';
      this.logger?.debug('Final result committed', {
        outcome,
        rawLength: result.text.length
      });
    } else {
      this.interimText = this.deps.normalizer.clean(result.text);
    }

    const { columns, rows } = this.deps.viewport();
    const rendered = this.deps.renderer.render(
      this.deps.store.snapshot(),
      this.interimText,
      columns,
      rows
    );

    this.latencyTracker.push({
      isFinal: result.isFinal,
      renderMs: Math.max(0, this.now() - startedAt),
      intervalMs,
      rendered
    });
  }

  public summarize(): LatencySummary {
    return this.latencyTracker.summarize();
  }
}
