export interface TextNormalizerOptions {
  removeFillers: boolean;
}

// Whole-word hesitation tokens plus the comma/period/space run that follows them.
// Word edges are Unicode-aware so endings like the "um" in "doğum" stay put.
const FILLER_PATTERN = /(?<![\p{L}\p{N}_])(?:um+|uh+|hmm+|erm+|eh+)(?![\p{L}\p{N}_])[,.\s]*/giu;

const normalizeSpacing = (value: string): string => {
  let normalized = value;

  normalized = normalized.replace(/\s+/g, ' ');

  // Remove spaces before punctuation.
  normalized = normalized.replace(/\s+([,.;:!?])/g, '$1');

  return normalized.trim();
};

export class TextNormalizer {
  private readonly options: TextNormalizerOptions;

  public constructor(options: Partial<TextNormalizerOptions> = {}) {
    this.options = { removeFillers: options.removeFillers ?? true };
  }

  public clean(raw: string): string {
    let output = raw.trim();
    if (!output) {
      return '';
    }

    if (this.options.removeFillers) {
      output = output.replace(FILLER_PATTERN, '');
    }

    return normalizeSpacing(output);
  }
}
