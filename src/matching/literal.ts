/**
 * Literal Data Decoder
 *
 * Decodes a closed literal-data grammar: string literals (single or double
 * quoted), list literals and mapping literals with string keys. This is what
 * models produce when they answer with a quoted collection instead of JSON,
 * e.g. `[{'topic': 'Trees', 'videos': ['BST Basics']}]`.
 *
 * Nothing is evaluated. Identifiers, numbers, calls, attribute access and
 * operators are syntax errors.
 *
 * Grammar:
 * ```
 * value   := string | list | mapping
 * list    := '[' ( value ( ',' value )* ','? )? ']'
 * mapping := '{' ( string ':' value ( ',' string ':' value )* ','? )? '}'
 * string  := "'" chars "'" | '"' chars '"'
 * ```
 *
 * @module matching/literal
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Parsed literal, tagged by kind.
 */
export type LiteralNode =
  | { kind: 'string'; value: string }
  | { kind: 'list'; items: LiteralNode[] }
  | { kind: 'mapping'; entries: Array<{ key: string; value: LiteralNode }> };

/**
 * Plain value produced from a literal tree.
 */
export type LiteralValue = string | LiteralValue[] | { [key: string]: LiteralValue };

/**
 * Syntax error with the offset where decoding stopped.
 */
export class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

// ============================================================================
// Parser
// ============================================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  '/': '/',
  '0': '\0',
};

/** Nesting guard against pathological inputs */
const MAX_DEPTH = 64;

class LiteralParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parseDocument(): LiteralNode {
    this.skipWhitespace();
    const node = this.parseValue(0);
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      this.fail(`Unexpected ${this.describeCurrent()} after the literal`);
    }
    return node;
  }

  private parseValue(depth: number): LiteralNode {
    if (depth > MAX_DEPTH) {
      this.fail(`Literal nested deeper than ${MAX_DEPTH} levels`);
    }

    switch (this.peek()) {
      case '[':
        return this.parseList(depth);
      case '{':
        return this.parseMapping(depth);
      case "'":
      case '"':
        return { kind: 'string', value: this.parseString() };
      case undefined:
        return this.fail('Unexpected end of input, expected a literal');
      default:
        return this.fail(
          `Unexpected ${this.describeCurrent()}; only string, list and mapping literals are allowed`
        );
    }
  }

  private parseList(depth: number): LiteralNode {
    const items: LiteralNode[] = [];
    this.expect('[');
    this.skipWhitespace();

    while (this.peek() !== ']') {
      items.push(this.parseValue(depth + 1));
      this.skipWhitespace();
      if (!this.consumeSeparator(']')) {
        break;
      }
    }

    this.expect(']');
    return { kind: 'list', items };
  }

  private parseMapping(depth: number): LiteralNode {
    const entries: Array<{ key: string; value: LiteralNode }> = [];
    this.expect('{');
    this.skipWhitespace();

    while (this.peek() !== '}') {
      const quote = this.peek();
      if (quote !== "'" && quote !== '"') {
        this.fail(`Mapping keys must be string literals, found ${this.describeCurrent()}`);
      }
      const key = this.parseString();
      this.skipWhitespace();
      this.expect(':');
      this.skipWhitespace();
      entries.push({ key, value: this.parseValue(depth + 1) });
      this.skipWhitespace();
      if (!this.consumeSeparator('}')) {
        break;
      }
    }

    this.expect('}');
    return { kind: 'mapping', entries };
  }

  /**
   * Consume a ',' between items. Returns false when the collection ends
   * without one; a trailing comma before `close` is allowed.
   */
  private consumeSeparator(close: string): boolean {
    if (this.peek() !== ',') {
      if (this.peek() !== close) {
        this.fail(`Expected ',' or '${close}', found ${this.describeCurrent()}`);
      }
      return false;
    }
    this.pos++;
    this.skipWhitespace();
    return true;
  }

  private parseString(): string {
    const quote = this.source[this.pos];
    const start = this.pos;
    this.pos++;
    let out = '';

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\n' || ch === '\r') {
        this.fail('Unterminated string literal (line break inside quotes)');
      }
      if (ch === '\\') {
        out += this.parseEscape();
        continue;
      }

      out += ch;
      this.pos++;
    }

    this.pos = start;
    return this.fail('Unterminated string literal');
  }

  private parseEscape(): string {
    const next: string | undefined = this.source[this.pos + 1];
    if (next === undefined) {
      return this.fail('Unterminated escape sequence');
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }

    if (next === 'u' || next === 'x') {
      const length = next === 'u' ? 4 : 2;
      const hex = this.source.slice(this.pos + 2, this.pos + 2 + length);
      if (hex.length !== length || !/^[0-9a-fA-F]+$/.test(hex)) {
        this.fail(`Invalid \\${next} escape`);
      }
      this.pos += 2 + length;
      return String.fromCharCode(parseInt(hex, 16));
    }

    // Unknown escapes keep the backslash, as quoted literals usually do
    this.pos += 2;
    return `\\${next}`;
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos] ?? '')) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private expect(ch: string): void {
    if (this.source[this.pos] !== ch) {
      this.fail(`Expected '${ch}', found ${this.describeCurrent()}`);
    }
    this.pos++;
  }

  private describeCurrent(): string {
    const rest = this.source.slice(this.pos);
    if (!rest) {
      return 'end of input';
    }
    const word = /^[A-Za-z_][A-Za-z0-9_]*/.exec(rest);
    if (word) {
      return `identifier '${word[0]}'`;
    }
    const number = /^[-+]?\d[\d._eE+-]*/.exec(rest);
    if (number) {
      return `number '${number[0]}'`;
    }
    return `'${rest[0]}'`;
  }

  private fail(message: string): never {
    throw new LiteralSyntaxError(message, this.pos);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse literal text into a tagged tree.
 *
 * @throws LiteralSyntaxError if the text is not exactly one literal
 */
export function parseLiteral(text: string): LiteralNode {
  return new LiteralParser(text).parseDocument();
}

/**
 * Convert a literal tree into plain values. Later duplicate keys win.
 */
export function toPlainValue(node: LiteralNode): LiteralValue {
  switch (node.kind) {
    case 'string':
      return node.value;
    case 'list':
      return node.items.map(toPlainValue);
    case 'mapping':
      return Object.fromEntries(
        node.entries.map(({ key, value }) => [key, toPlainValue(value)] as const)
      );
  }
}

/**
 * Decode literal text straight into plain values.
 *
 * @throws LiteralSyntaxError if the text is not exactly one literal
 */
export function decodeLiteral(text: string): LiteralValue {
  return toPlainValue(parseLiteral(text));
}
