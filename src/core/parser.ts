import type { Binding, Segment, Statement } from "./types.ts";

const DOUBLE_QUOTE_ESCAPES = new Map<string, string>([
  ["\\", "\\"],
  ['"', '"'],
  ["'", "'"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
  ["a", "\x07"],
  ["b", "\b"],
  ["f", "\f"],
  ["v", "\v"],
]);

const isWhitespace = (char: string): boolean => /\s/.test(char);
const isNewline = (char: string): boolean => char === "\n" || char === "\r";
const isHorizontalSpace = (char: string): boolean => isWhitespace(char) && !isNewline(char);

export class ParseError extends Error {
  constructor(message: string, public offset: number) {
    super(message);
    this.name = "ParseError";
  }
}

export class Parser {
  private pos = 0;
  private lineStarts: number[] = [0];

  constructor(private text: string) {
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === "\r" && text[i + 1] === "\n") {
        continue;
      }
      if (isNewline(char)) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  parse(): Statement[] {
    const statements: Statement[] = [];

    while (this.pos < this.text.length) {
      statements.push(this.parseStatement());
    }

    return statements;
  }

  private parseStatement(): Statement {
    const start = this.pos;
    this.skipWhile(isWhitespace);

    if (this.pos >= this.text.length) {
      return { type: "blank", original: this.text.slice(start), line: this.lineAt(start) };
    }

    const line = this.lineAt(this.pos);

    if (this.peek() === "#") {
      const text = this.readComment();
      this.readLineEnd();
      return { type: "comment", text, original: this.text.slice(start, this.pos), line };
    }

    try {
      return { type: "binding", data: this.parseBinding(start, line) };
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      // Drop the rest of the line where the problem started and resume after it
      this.pos = error.offset;
      this.skipWhile((char) => !isNewline(char));
      this.readLineEnd();
      return { type: "error", original: this.text.slice(start, this.pos), line };
    }
  }

  private parseBinding(start: number, line: number): Binding {
    this.skipExport();
    const key = this.parseKey();
    this.skipWhile(isHorizontalSpace);

    let value: string | null = null;
    let segments: Segment[] = [];

    if (this.peek() === "=") {
      this.pos++;
      this.skipWhile(isHorizontalSpace);
      segments = this.parseValue();
      value = segments.map((segment) => segment.text).join("");
    } else {
      this.expectLineEnd();
    }

    this.readLineEnd();

    return {
      key,
      value,
      segments,
      original: this.text.slice(start, this.pos),
      line,
    };
  }

  private skipExport(): void {
    const keyword = "export";
    if (
      this.text.startsWith(keyword, this.pos) &&
      isHorizontalSpace(this.text[this.pos + keyword.length] ?? "")
    ) {
      this.pos += keyword.length;
      this.skipWhile(isHorizontalSpace);
    }
  }

  private parseKey(): string {
    if (this.peek() === "'") {
      const end = this.text.indexOf("'", this.pos + 1);
      if (end <= this.pos + 1) {
        throw new ParseError("Invalid quoted key", this.pos);
      }
      const key = this.text.slice(this.pos + 1, end);
      this.pos = end + 1;
      return key;
    }

    const begin = this.pos;
    this.skipWhile((char) => char !== "=" && char !== "#" && !isWhitespace(char));
    if (this.pos === begin) {
      throw new ParseError("Missing key", begin);
    }
    return this.text.slice(begin, this.pos);
  }

  private parseValue(): Segment[] {
    const segments: Segment[] = [];

    while (this.pos < this.text.length) {
      const char = this.text[this.pos];

      if (isNewline(char)) {
        break;
      }

      if (char === "'") {
        segments.push({ quote: "single", text: this.readSingleQuoted() });
      } else if (char === '"') {
        segments.push({ quote: "double", text: this.readDoubleQuoted() });
      } else if (char === "#" && this.startsComment()) {
        this.readComment();
        break;
      } else {
        segments.push({ quote: "unquoted", text: this.readUnquoted() });
      }
    }

    const last = segments[segments.length - 1];
    if (last?.quote === "unquoted") {
      const text = last.text.trimEnd();
      segments.pop();
      if (text) {
        segments.push({ quote: "unquoted", text });
      }
    }

    return segments;
  }

  private readSingleQuoted(): string {
    const open = this.pos;
    let text = "";
    this.pos++;

    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      const next = this.text[this.pos + 1];

      if (char === "\\" && (next === "'" || next === "\\")) {
        text += next;
        this.pos += 2;
        continue;
      }

      if (char === "'") {
        this.pos++;
        return text;
      }

      text += char;
      this.pos++;
    }

    throw new ParseError("Unterminated single-quoted value", open);
  }

  private readDoubleQuoted(): string {
    const open = this.pos;
    let text = "";
    this.pos++;

    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      const next = this.text[this.pos + 1];

      if (char === "\\" && next !== undefined) {
        text += DOUBLE_QUOTE_ESCAPES.get(next) ?? char + next;
        this.pos += 2;
        continue;
      }

      if (char === '"') {
        this.pos++;
        return text;
      }

      text += char;
      this.pos++;
    }

    throw new ParseError("Unterminated double-quoted value", open);
  }

  private readUnquoted(): string {
    const begin = this.pos;

    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      if (char === "'" || char === '"' || isNewline(char)) break;
      if (char === "#" && this.pos > begin && this.startsComment()) break;
      this.pos++;
    }

    return this.text.slice(begin, this.pos);
  }

  /** A `#` opens a comment after whitespace or a closing quote. */
  private startsComment(): boolean {
    const previous = this.text[this.pos - 1] ?? "";
    return isWhitespace(previous) || previous === "'" || previous === '"';
  }

  private readComment(): string {
    const begin = this.pos + 1;
    this.skipWhile((char) => !isNewline(char));
    return this.text.slice(begin, this.pos).trim();
  }

  private expectLineEnd(): void {
    const char = this.peek();
    if (char === undefined || isNewline(char)) {
      return;
    }
    if (char === "#") {
      this.readComment();
      return;
    }
    throw new ParseError(`Unexpected character ${JSON.stringify(char)}`, this.pos);
  }

  private readLineEnd(): void {
    if (this.text.startsWith("\r\n", this.pos)) {
      this.pos += 2;
    } else if (isNewline(this.peek() ?? "")) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private skipWhile(predicate: (char: string) => boolean): void {
    while (this.pos < this.text.length && predicate(this.text[this.pos])) {
      this.pos++;
    }
  }

  private lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }
}

export function parseStatements(text: string): Statement[] {
  return new Parser(text).parse();
}

export function parse(text: string): Binding[] {
  const bindings: Binding[] = [];
  for (const statement of parseStatements(text)) {
    if (statement.type === "binding") {
      bindings.push(statement.data);
    }
  }
  return bindings;
}
