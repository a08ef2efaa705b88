import { PresentationMode } from '../types';

export const NO_TRANSCRIPT_MESSAGE = '(No final transcript captured.)';

export const formatBanner = (mode: PresentationMode): string => {
  const suffix = mode === 'finalOnly' ? ' (Final-only mode)' : '';
  return `🎙️  Listening… press Ctrl+C to stop.${suffix}\n\n`;
};

export const formatFinalReport = (transcript: string): string => {
  if (!transcript) {
    return `\n${NO_TRANSCRIPT_MESSAGE}\n`;
  }

  return `\n📝 Transcript (single paragraph):\n${transcript}\n`;
};
