/**
 * Offset ↔ line bookkeeping for a source text. Lines and columns are 1-based.
 */
export class SourceLines {
  private readonly lineStarts: number[] = [0];

  constructor(readonly source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source[i] === "\n") this.lineStarts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  lineAt(index: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= index) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  columnAt(index: number): number {
    return index - this.lineStart(this.lineAt(index)) + 1;
  }

  lineStart(line: number): number {
    return this.lineStarts[line - 1];
  }

  lineText(line: number): string {
    const start = this.lineStart(line);
    const end = line < this.lineStarts.length ? this.lineStarts[line] - 1 : this.source.length;
    return this.source.slice(start, end).replace(/\r$/, "");
  }

  /** Raw text of the lines `startLine..endLine`, inclusive. */
  context(startLine: number, endLine: number): string {
    const lines: string[] = [];
    for (let line = startLine; line <= endLine; line++) lines.push(this.lineText(line));
    return lines.join("\n");
  }
}
