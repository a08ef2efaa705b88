import { formatBanner, formatFinalReport, NO_TRANSCRIPT_MESSAGE } from '../../src/cli/finalReport';

describe('finalReport', () => {
  it('prints the transcript as a single paragraph', () => {
    expect(formatFinalReport('testing one two three')).toBe(
      '\n📝 Transcript (single paragraph):\ntesting one two three\n'
    );
  });

  it('says so when nothing was finalized', () => {
    expect(formatFinalReport('')).toBe(`\n${NO_TRANSCRIPT_MESSAGE}\n`);
  });

  it('marks the banner in final-only mode', () => {
    expect(formatBanner('multiLineWrap')).toBe('🎙️  Listening… press Ctrl+C to stop.\n\n');
    expect(formatBanner('finalOnly')).toBe('🎙️  Listening… press Ctrl+C to stop. (Final-only mode)\n\n');
  });
});
