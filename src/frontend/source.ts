import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * A `.c8s` file's text with the offset of every line start, for turning offsets into positions.
 */
export interface SourceFile {
  path: string;
  text: string;
  lineStarts: number[];
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let nl = text.indexOf('\n'); nl !== -1; nl = text.indexOf('\n', nl + 1)) {
    lineStarts.push(nl + 1);
  }
  return { path, text, lineStarts };
}

/**
 * 1-based line and column of `offset`. Offsets past the end map to the end of the text.
 */
export function positionAt(file: SourceFile, offset: number): SourcePosition {
  const at = Math.max(0, Math.min(offset, file.text.length));
  // Last line whose start is <= at.
  let line = 0;
  let count = file.lineStarts.length;
  while (count > 1) {
    const half = Math.floor(count / 2);
    if ((file.lineStarts[line + half] ?? Infinity) <= at) line += half;
    count -= half;
  }
  return { line: line + 1, column: at - (file.lineStarts[line] ?? 0) + 1, offset: at };
}

/**
 * Span covering `[start, end)` of `file`.
 */
export function span(file: SourceFile, start: number, end: number): SourceSpan {
  return { file: file.path, start: positionAt(file, start), end: positionAt(file, end) };
}

/** `line:column` of a span start, as quoted inside diagnostic messages. */
export function formatPosition(s: SourceSpan): string {
  return `${s.start.line}:${s.start.column}`;
}

/**
 * Read head over a source file. The lexer moves it one character (or one run) at a time and asks
 * it for the text and span of what it has consumed since a token began.
 */
export class SourceCursor {
  private offset = 0;

  constructor(readonly file: SourceFile) {}

  get pos(): number {
    return this.offset;
  }

  atEnd(): boolean {
    return this.offset >= this.file.text.length;
  }

  /** Character `ahead` places past the head, or `''` beyond the end. */
  peek(ahead = 0): string {
    return this.file.text[this.offset + ahead] ?? '';
  }

  advance(count = 1): void {
    this.offset = Math.min(this.offset + count, this.file.text.length);
  }

  advanceWhile(test: (ch: string) => boolean): void {
    while (!this.atEnd() && test(this.peek())) this.offset++;
  }

  textFrom(start: number): string {
    return this.file.text.slice(start, this.offset);
  }

  spanFrom(start: number): SourceSpan {
    return span(this.file, start, this.offset);
  }
}
