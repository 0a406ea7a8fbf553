import { Arena, type Index } from "./arena.ts";

/** Byte-offset range within source text (half-open: `[start, end)`). */
export interface Span {
  start: number;
  end: number;
}

export function span(start: number, end: number): Span {
  return { start, end };
}

/** Span covering everything from the start of `from` to the end of `to`. */
export function joinSpans(from: Span, to: Span): Span {
  return { start: from.start, end: to.end };
}

export interface LineColumn {
  line: number;
  column: number;
}

export class SourceFile {
  readonly filename: string;
  readonly content: string;
  private lineOffsets: number[];

  constructor(filename: string, content: string) {
    this.filename = filename;
    this.content = content;
    this.lineOffsets = this.computeLineOffsets();
  }

  private computeLineOffsets(): number[] {
    const offsets: number[] = [0];
    for (let idx = 0; idx < this.content.length; idx++) {
      if (this.content[idx] === "\n") {
        offsets.push(idx + 1);
      } else if (this.content[idx] === "\r") {
        if (idx + 1 < this.content.length && this.content[idx + 1] === "\n") {
          idx++;
        }
        offsets.push(idx + 1);
      }
    }
    return offsets;
  }

  lineCol(offset: number): LineColumn {
    let low = 0;
    let high = this.lineOffsets.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineOffsets[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return {
      line: low + 1,
      column: offset - (this.lineOffsets[low] ?? 0) + 1,
    };
  }

  /** Text of a 1-based line, without its line terminator. */
  lineText(line: number): string {
    const start = this.lineOffsets[line - 1];
    if (start === undefined) return "";
    const next = this.lineOffsets[line];
    const raw = this.content.slice(start, next ?? this.content.length);
    return raw.replace(/\r?\n$|\r$/, "");
  }

  get length(): number {
    return this.content.length;
  }
}

/** Handle of a registered {@link SourceFile}. */
export type FileId = Index<SourceFile>;

/** Registry of every source file taking part in one compilation. */
export class SourceFiles {
  private readonly files = new Arena<SourceFile>("source file");

  add(filename: string, content: string): FileId {
    return this.files.insert(new SourceFile(filename, content));
  }

  get(file: FileId): SourceFile {
    return this.files.get(file);
  }

  has(file: number): boolean {
    return this.files.has(file);
  }
}
