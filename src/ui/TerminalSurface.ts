import readline from 'node:readline';

export type RedrawOp =
  | { kind: 'cursorUp'; rows: number }
  | { kind: 'columnZero' }
  | { kind: 'clearLine' }
  | { kind: 'clearDown' }
  | { kind: 'cursorBack'; columns: number }
  | { kind: 'write'; text: string };

export interface TerminalSurface {
  apply(plan: RedrawOp[]): void;
}

export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

/**
 * Applies redraw plans to a Node stream. Cursor movement and clearing only
 * happen on a TTY; elsewhere the plan degrades to carriage returns and the
 * space padding the renderer already includes.
 */
export class StreamTerminalSurface implements TerminalSurface {
  private readonly ansi: boolean;

  public constructor(
    private readonly stream: TerminalOutput,
    ansi?: boolean
  ) {
    this.ansi = ansi ?? Boolean(stream.isTTY);
  }

  public apply(plan: RedrawOp[]): void {
    for (const op of plan) {
      this.applyOp(op);
    }
  }

  private applyOp(op: RedrawOp): void {
    switch (op.kind) {
      case 'write':
        this.stream.write(op.text);
        return;
      case 'columnZero':
        if (this.ansi) {
          readline.cursorTo(this.stream, 0);
        } else {
          this.stream.write('\r');
        }
        return;
      case 'cursorUp':
        if (this.ansi && op.rows > 0) {
          readline.moveCursor(this.stream, 0, -op.rows);
        }
        return;
      case 'cursorBack':
        if (this.ansi && op.columns > 0) {
          readline.moveCursor(this.stream, -op.columns, 0);
        }
        return;
      case 'clearLine':
        if (this.ansi) {
          readline.clearLine(this.stream, 1);
        }
        return;
      case 'clearDown':
        if (this.ansi) {
          readline.clearScreenDown(this.stream);
        }
        return;
    }
  }
}
