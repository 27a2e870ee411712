// Property list parser
//
// Parses the old-style (OpenStep) property list syntax used by project.pbxproj:
// - { key = value; ... }  → dictionary
// - ( value, value, )     → array
// - "quoted \"string\""   → string
// - unquoted_token.name   → string
// - <0fbd 7700>           → data, kept as its hex text
// Comments (/* ... */ and // ...) are skipped.

export type PlistValue = string | PlistValue[] | PlistDict;

export interface PlistDict {
  [key: string]: PlistValue;
}

export class PlistParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public column: number
  ) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'PlistParseError';
  }
}

const UNQUOTED = /[A-Za-z0-9_$+/:.\-]/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  "'": "'",
};

class Parser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parseDocument(): PlistValue {
    const value = this.parseValue();
    this.skipTrivia();
    if (this.pos < this.input.length) {
      throw this.error(`Unexpected "${this.input[this.pos]}" after top-level value`);
    }
    return value;
  }

  private parseValue(): PlistValue {
    this.skipTrivia();
    const ch = this.input[this.pos];

    if (ch === undefined) throw this.error('Unexpected end of input');
    if (ch === '{') return this.parseDict();
    if (ch === '(') return this.parseArray();
    if (ch === '"') return this.parseQuoted();
    if (ch === '<') return this.parseData();
    if (UNQUOTED.test(ch)) return this.parseUnquoted();

    throw this.error(`Unexpected "${ch}"`);
  }

  private parseDict(): PlistDict {
    this.expect('{');
    const dict: PlistDict = {};

    for (;;) {
      this.skipTrivia();
      if (this.peek() === '}') {
        this.pos++;
        return dict;
      }

      const key = this.parseKey();
      this.skipTrivia();
      this.expect('=');
      dict[key] = this.parseValue();
      this.skipTrivia();
      this.expect(';');
    }
  }

  private parseKey(): string {
    const ch = this.peek();
    if (ch === '"') return this.parseQuoted();
    if (ch !== undefined && UNQUOTED.test(ch)) return this.parseUnquoted();
    throw ch === undefined
      ? this.error('Unexpected end of input, expected "}"')
      : this.error(`Unexpected "${ch}", expected a key`);
  }

  private parseArray(): PlistValue[] {
    this.expect('(');
    const items: PlistValue[] = [];

    for (;;) {
      this.skipTrivia();
      if (this.peek() === ')') {
        this.pos++;
        return items;
      }

      items.push(this.parseValue());
      this.skipTrivia();

      const next = this.peek();
      if (next === ',') {
        this.pos++;
      } else if (next !== ')') {
        throw next === undefined
          ? this.error('Unexpected end of input, expected ")"')
          : this.error(`Unexpected "${next}", expected "," or ")"`);
      }
    }
  }

  private parseQuoted(): string {
    this.expect('"');
    let value = '';

    for (;;) {
      const ch = this.input[this.pos];
      if (ch === undefined) throw this.error('Unterminated string');
      this.pos++;

      if (ch === '"') return value;
      if (ch !== '\\') {
        value += ch;
        continue;
      }

      const escaped = this.input[this.pos];
      if (escaped === undefined) throw this.error('Unterminated string');
      this.pos++;

      if (escaped === 'U') {
        const hex = this.input.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw this.error('Invalid \\U escape');
        value += String.fromCharCode(parseInt(hex, 16));
        this.pos += 4;
      } else {
        value += ESCAPES[escaped] ?? escaped;
      }
    }
  }

  private parseUnquoted(): string {
    const start = this.pos;
    while (this.pos < this.input.length && UNQUOTED.test(this.input[this.pos] ?? '')) {
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  private parseData(): string {
    this.expect('<');
    const end = this.input.indexOf('>', this.pos);
    if (end === -1) throw this.error('Unterminated data');
    const hex = this.input.slice(this.pos, end).replace(/\s+/g, '');
    if (!/^[0-9a-fA-F]*$/.test(hex)) throw this.error('Invalid data');
    this.pos = end + 1;
    return hex;
  }

  private skipTrivia(): void {
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos] ?? '';
      if (/\s/.test(ch)) {
        this.pos++;
      } else if (this.input.startsWith('//', this.pos)) {
        const end = this.input.indexOf('\n', this.pos);
        this.pos = end === -1 ? this.input.length : end + 1;
      } else if (this.input.startsWith('/*', this.pos)) {
        const end = this.input.indexOf('*/', this.pos + 2);
        if (end === -1) throw this.error('Unterminated comment');
        this.pos = end + 2;
      } else {
        return;
      }
    }
  }

  private peek(): string | undefined {
    return this.input[this.pos];
  }

  private expect(ch: string): void {
    const actual = this.input[this.pos];
    if (actual !== ch) {
      throw actual === undefined
        ? this.error(`Unexpected end of input, expected "${ch}"`)
        : this.error(`Unexpected "${actual}", expected "${ch}"`);
    }
    this.pos++;
  }

  private error(message: string): PlistParseError {
    const before = this.input.slice(0, this.pos);
    const line = before.split('\n').length;
    const column = this.pos - before.lastIndexOf('\n');
    return new PlistParseError(message, line, column);
  }
}

/**
 * Parse an old-style property list document.
 * @throws PlistParseError with the line and column of the first syntax error
 */
export function parsePlist(input: string): PlistValue {
  return new Parser(input).parseDocument();
}

export function isPlistDict(value: PlistValue | undefined): value is PlistDict {
  return typeof value === 'object' && !Array.isArray(value);
}
