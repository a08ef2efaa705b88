import { TextNormalizer } from '../services/text/TextNormalizer';
import { PresentationMode } from '../types';
import { BlockSnapshot, LineSnapshot, RenderState } from './RenderState';
import { RedrawOp, TerminalSurface } from './TerminalSurface';

export const ELLIPSIS = '…';

export interface ViewportRendererOptions {
  mode: PresentationMode;
}

/** Greedy word wrap; a word wider than `width` sits alone on its line, unsplit. */
export const wrapWords = (text: string, width: number): string[] => {
  const columns = Math.max(1, width);
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(' ')) {
    if (!word) {
      continue;
    }

    if (!current) {
      current = word;
      continue;
    }

    if (current.length + 1 + word.length <= columns) {
      current = `${current} ${word}`;
      continue;
    }

    lines.push(current);
    current = word;
  }

  if (current) {
    lines.push(current);
  }

  return lines;
};

/** Rows a line takes on screen; the terminal wraps anything wider than `width`. */
export const physicalRows = (line: string, width: number): number =>
  Math.max(1, Math.ceil(line.length / Math.max(1, width)));

/** Keeps the most recent characters visible within `width - 2` columns. */
export const tailView = (text: string, width: number): string => {
  const maxChars = Math.max(1, width - 2);
  if (text.length <= maxChars) {
    return text;
  }

  return `${ELLIPSIS}${text.slice(text.length - (maxChars - 1))}`;
};

export class ViewportRenderer {
  private readonly state = new RenderState();
  private writes = 0;

  public constructor(
    private readonly surface: TerminalSurface,
    private readonly normalizer: TextNormalizer,
    private readonly options: ViewportRendererOptions
  ) {}

  public getWriteCount(): number {
    return this.writes;
  }

  /**
   * Presents committed plus interim text. Returns false when nothing was
   * written because the view already shows exactly this content.
   */
  public render(
    committedText: string,
    interimText: string,
    terminalWidth: number,
    terminalRows?: number
  ): boolean {
    if (this.options.mode === 'finalOnly') {
      return false;
    }

    const candidate = interimText
      ? this.normalizer.clean(`${committedText} ${interimText}`)
      : this.normalizer.clean(committedText);

    const next = this.layout(candidate, terminalWidth, terminalRows);
    if (this.state.matches(next)) {
      return false;
    }

    const plan =
      next.kind === 'line' ? this.planLineRedraw(next.text) : this.planBlockRedraw(next);

    this.surface.apply(plan);
    this.state.set(next);
    this.writes += 1;
    return true;
  }

  /** Leaves the cursor on a fresh line below whatever is currently drawn. */
  public finish(): void {
    if (this.state.isEmpty()) {
      return;
    }

    this.surface.apply([{ kind: 'write', text: '\n' }]);
    this.state.reset();
  }

  private layout(
    candidate: string,
    width: number,
    rows?: number
  ): LineSnapshot | BlockSnapshot {
    if (this.options.mode === 'singleLineTail') {
      return { kind: 'line', text: tailView(candidate, width) };
    }

    const lines = wrapWords(candidate, width);
    if (rows === undefined || rows < 1) {
      return this.block(lines, width);
    }

    // Never taller than the screen, or the cursor cannot climb back to the origin.
    const maxRows = Math.max(1, rows - 1);
    const kept: string[] = [];
    let used = 0;

    for (let index = lines.length - 1; index >= 0; index -= 1) {
      const line = lines[index];
      const height = physicalRows(line, width);

      if (kept.length === 0 && height > maxRows) {
        kept.unshift(line.slice(line.length - maxRows * Math.max(1, width)));
        break;
      }

      if (used + height > maxRows) {
        break;
      }

      kept.unshift(line);
      used += height;
    }

    return this.block(kept, width);
  }

  private block(lines: string[], width: number): BlockSnapshot {
    return {
      kind: 'block',
      lines,
      rows: lines.reduce((total, line) => total + physicalRows(line, width), 0)
    };
  }

  private planLineRedraw(view: string): RedrawOp[] {
    const plan: RedrawOp[] = [{ kind: 'columnZero' }, { kind: 'clearLine' }];
    const padding = Math.max(0, this.state.lineLength() - view.length);
    const text = `${view}${' '.repeat(padding)}`;

    if (text) {
      plan.push({ kind: 'write', text });
    }

    if (padding > 0) {
      plan.push({ kind: 'cursorBack', columns: padding });
    }

    return plan;
  }

  private planBlockRedraw(next: BlockSnapshot): RedrawOp[] {
    const plan: RedrawOp[] = [];
    const previousRows = this.state.rowCount();

    if (previousRows > 0) {
      if (previousRows > 1) {
        plan.push({ kind: 'cursorUp', rows: previousRows - 1 });
      }
      plan.push({ kind: 'columnZero' }, { kind: 'clearDown' });
    }

    if (next.lines.length > 0) {
      plan.push({ kind: 'write', text: next.lines.join('\n') });
    }

    return plan;
  }
}
