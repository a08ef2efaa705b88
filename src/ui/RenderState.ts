export interface LineSnapshot {
  kind: 'line';
  text: string;
}

export interface BlockSnapshot {
  kind: 'block';
  lines: string[];
  /** Terminal rows the lines occupy once the terminal wraps overlong ones. */
  rows: number;
}

export type RenderSnapshot = { kind: 'empty' } | LineSnapshot | BlockSnapshot;

const EMPTY: RenderSnapshot = { kind: 'empty' };

export class RenderState {
  private current: RenderSnapshot = EMPTY;

  public set(next: RenderSnapshot): void {
    this.current = next;
  }

  public reset(): void {
    this.current = EMPTY;
  }

  public isEmpty(): boolean {
    return this.rowCount() === 0;
  }

  public rowCount(): number {
    if (this.current.kind === 'block') {
      return this.current.rows;
    }

    if (this.current.kind === 'line') {
      return this.current.text ? 1 : 0;
    }

    return 0;
  }

  /** Characters on screen for a single-line snapshot; 0 otherwise. */
  public lineLength(): number {
    return this.current.kind === 'line' ? this.current.text.length : 0;
  }

  public matches(next: RenderSnapshot): boolean {
    const current = this.current;

    if (current.kind === 'block' && next.kind === 'block') {
      return (
        current.lines.length === next.lines.length &&
        current.lines.every((line, index) => line === next.lines[index])
      );
    }

    if (current.kind === 'line' && next.kind === 'line') {
      return current.text === next.text;
    }

    return this.isEmpty() && isBlank(next);
  }
}

const isBlank = (snapshot: RenderSnapshot): boolean => {
  if (snapshot.kind === 'block') {
    return snapshot.lines.length === 0;
  }

  if (snapshot.kind === 'line') {
    return snapshot.text.length === 0;
  }

  return true;
};
