import { TextNormalizer } from '../text/TextNormalizer';

export type CommitOutcome = 'appended' | 'extended' | 'duplicate' | 'empty';

export interface TranscriptStoreStats {
  appended: number;
  extended: number;
  duplicates: number;
  empty: number;
}

/**
 * Append-only store of finalized transcript segments.
 *
 * Only the immediately preceding final is consulted when deciding whether a
 * new final is a retransmission, so a repeat separated by a different segment
 * is committed again.
 */
export class TranscriptStore {
  private readonly committed: string[] = [];
  private lastCommitted = '';
  private readonly counters: TranscriptStoreStats = {
    appended: 0,
    extended: 0,
    duplicates: 0,
    empty: 0
  };

  public constructor(private readonly normalizer: TextNormalizer) {}

  public commitFinal(rawSegment: string): CommitOutcome {
    const cleaned = this.normalizer.clean(rawSegment);
    if (!cleaned) {
      this.counters.empty += 1;
      return 'empty';
    }

    if (cleaned === this.lastCommitted) {
      this.counters.duplicates += 1;
      return 'duplicate';
    }

    const remainder = this.extensionOfLast(cleaned);
    this.lastCommitted = cleaned;

    if (remainder === undefined) {
      this.committed.push(cleaned);
      this.counters.appended += 1;
      return 'appended';
    }

    this.committed.push(remainder);
    this.counters.extended += 1;
    return 'extended';
  }

  public snapshot(): string {
    return this.committed.join(' ');
  }

  public segments(): string[] {
    return [...this.committed];
  }

  /** The joined transcript cleaned once more, so inter-segment spacing is normalized. */
  public finalTranscript(): string {
    return this.normalizer.clean(this.snapshot());
  }

  public stats(): TranscriptStoreStats {
    return { ...this.counters };
  }

  // A backend may re-finalize an utterance it already finalized, now grown by
  // a few words. Returns the words past the previous final, or undefined when
  // the new segment does not start with exactly those words.
  private extensionOfLast(cleaned: string): string | undefined {
    if (!this.lastCommitted) {
      return undefined;
    }

    const previousWords = this.lastCommitted.split(' ');
    const nextWords = cleaned.split(' ');
    if (nextWords.length <= previousWords.length) {
      return undefined;
    }

    for (let index = 0; index < previousWords.length; index += 1) {
      if (nextWords[index] !== previousWords[index]) {
        return undefined;
      }
    }

    return nextWords.slice(previousWords.length).join(' ');
  }
}
