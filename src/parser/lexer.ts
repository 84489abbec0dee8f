// Lexer for the interface schema language

import { SchemaSyntaxError } from '../errors';
import { Position, SourceLocation } from '../types';

export enum TokenType {
  // Literals
  INTEGER = 'INTEGER',
  FLOAT = 'FLOAT',
  STRING = 'STRING',

  IDENTIFIER = 'IDENTIFIER',

  // Keywords
  NAMESPACE = 'namespace',
  ENUM = 'enum',
  DICTIONARY = 'dictionary',
  INTERFACE = 'interface',
  CALLBACK = 'callback',
  TYPEDEF = 'typedef',
  CONSTRUCTOR = 'constructor',
  STATIC = 'static',
  REQUIRED = 'required',
  OPTIONAL = 'optional',
  SEQUENCE = 'sequence',
  RECORD = 'record',
  VOID = 'void',
  TRUE = 'true',
  FALSE = 'false',
  NULL = 'null',

  // Punctuation
  SEMICOLON = ';',
  COMMA = ',',
  ASSIGN = '=',
  QUESTION = '?',
  LESS_THAN = '<',
  GREATER_THAN = '>',
  LEFT_PAREN = '(',
  RIGHT_PAREN = ')',
  LEFT_BRACE = '{',
  RIGHT_BRACE = '}',
  LEFT_BRACKET = '[',
  RIGHT_BRACKET = ']',

  EOF = 'EOF'
}

export interface Token {
  type: TokenType;
  value: string;
  location: SourceLocation;
}

// Use a Map for keywords to avoid prototype collisions (e.g. constructor)
const KEYWORDS: Map<string, TokenType> = new Map([
  ['namespace', TokenType.NAMESPACE],
  ['enum', TokenType.ENUM],
  ['dictionary', TokenType.DICTIONARY],
  ['interface', TokenType.INTERFACE],
  ['callback', TokenType.CALLBACK],
  ['typedef', TokenType.TYPEDEF],
  ['constructor', TokenType.CONSTRUCTOR],
  ['static', TokenType.STATIC],
  ['required', TokenType.REQUIRED],
  ['optional', TokenType.OPTIONAL],
  ['sequence', TokenType.SEQUENCE],
  ['record', TokenType.RECORD],
  ['void', TokenType.VOID],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['null', TokenType.NULL]
]);

const KEYWORD_TYPES: ReadonlySet<TokenType> = new Set(KEYWORDS.values());

export function isKeyword(type: TokenType): boolean {
  return KEYWORD_TYPES.has(type);
}

const PUNCTUATION: Map<string, TokenType> = new Map([
  [';', TokenType.SEMICOLON],
  [',', TokenType.COMMA],
  ['=', TokenType.ASSIGN],
  ['?', TokenType.QUESTION],
  ['<', TokenType.LESS_THAN],
  ['>', TokenType.GREATER_THAN],
  ['(', TokenType.LEFT_PAREN],
  [')', TokenType.RIGHT_PAREN],
  ['{', TokenType.LEFT_BRACE],
  ['}', TokenType.RIGHT_BRACE],
  ['[', TokenType.LEFT_BRACKET],
  [']', TokenType.RIGHT_BRACKET]
]);

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private filename?: string;

  constructor(input: string, filename?: string) {
    this.input = input;
    this.filename = filename;
  }

  private current(): string {
    return this.input[this.position] || '';
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || '';
  }

  private advance(): string {
    const char = this.current();
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private createPosition(): Position {
    return { line: this.line, column: this.column };
  }

  private createLocation(start: Position): SourceLocation {
    return {
      start,
      end: this.createPosition(),
      filename: this.filename
    };
  }

  private error(message: string, start: Position): SchemaSyntaxError {
    return new SchemaSyntaxError(message, { location: this.createLocation(start) });
  }

  private skipLineComment(): void {
    while (this.current() !== '\n' && this.current() !== '') {
      this.advance();
    }
  }

  private skipBlockComment(start: Position): void {
    // Skip /*
    this.advance();
    this.advance();

    while (this.current() !== '' && !(this.current() === '*' && this.peek() === '/')) {
      this.advance();
    }

    if (this.current() === '') {
      throw this.error('Unterminated block comment', start);
    }
    this.advance(); // *
    this.advance(); // /
  }

  private readString(start: Position): string {
    let value = '';
    this.advance(); // Skip opening quote

    while (this.current() !== '"') {
      if (this.current() === '' || this.current() === '\n') {
        throw this.error('Unterminated string literal', start);
      }
      if (this.current() === '\\') {
        this.advance();
        const escaped = this.current();
        switch (escaped) {
          case 'n': value += '\n'; break;
          case 't': value += '\t'; break;
          case 'r': value += '\r'; break;
          case '\\': value += '\\'; break;
          case '"': value += '"'; break;
          default:
            throw this.error(`Unknown escape sequence '\\${escaped}'`, start);
        }
      } else {
        value += this.current();
      }
      this.advance();
    }

    this.advance(); // Skip closing quote
    return value;
  }

  private readNumber(start: Position): Token {
    let value = '';
    if (this.current() === '-') {
      value += this.advance();
    }

    if (this.current() === '0' && (this.peek() === 'x' || this.peek() === 'X')) {
      value += this.advance();
      value += this.advance();
      while (/[0-9a-fA-F]/.test(this.current())) {
        value += this.advance();
      }
      if (!/[0-9a-fA-F]$/.test(value)) {
        throw this.error(`Malformed hexadecimal literal '${value}'`, start);
      }
      return { type: TokenType.INTEGER, value, location: this.createLocation(start) };
    }

    let isFloat = false;
    while (/\d/.test(this.current())) {
      value += this.advance();
    }
    if (this.current() === '.' && /\d/.test(this.peek())) {
      isFloat = true;
      value += this.advance();
      while (/\d/.test(this.current())) {
        value += this.advance();
      }
    }
    if (this.current() === 'e' || this.current() === 'E') {
      isFloat = true;
      value += this.advance();
      if (this.current() === '+' || this.current() === '-') {
        value += this.advance();
      }
      if (!/\d/.test(this.current())) {
        throw this.error(`Malformed exponent in '${value}'`, start);
      }
      while (/\d/.test(this.current())) {
        value += this.advance();
      }
    }

    if (/[a-zA-Z_]/.test(this.current())) {
      throw this.error(`Unexpected character '${this.current()}' after number '${value}'`, start);
    }

    return {
      type: isFloat ? TokenType.FLOAT : TokenType.INTEGER,
      value,
      location: this.createLocation(start)
    };
  }

  private readIdentifier(): string {
    let value = '';
    while (/[a-zA-Z0-9_]/.test(this.current())) {
      value += this.advance();
    }
    return value;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.position < this.input.length) {
      const start = this.createPosition();

      if (/\s/.test(this.current())) {
        this.advance();
        continue;
      }

      // Comments
      if (this.current() === '/' && this.peek() === '/') {
        this.skipLineComment();
        continue;
      }

      if (this.current() === '/' && this.peek() === '*') {
        this.skipBlockComment(start);
        continue;
      }

      if (this.current() === '"') {
        const value = this.readString(start);
        tokens.push({ type: TokenType.STRING, value, location: this.createLocation(start) });
        continue;
      }

      // Numbers, including a directly attached minus sign
      if (/\d/.test(this.current()) || (this.current() === '-' && /\d/.test(this.peek()))) {
        tokens.push(this.readNumber(start));
        continue;
      }

      // Identifiers and keywords
      if (/[a-zA-Z_]/.test(this.current())) {
        const value = this.readIdentifier();
        const tokenType = KEYWORDS.get(value) ?? TokenType.IDENTIFIER;
        tokens.push({ type: tokenType, value, location: this.createLocation(start) });
        continue;
      }

      const char = this.advance();
      const tokenType = PUNCTUATION.get(char);
      if (tokenType === undefined) {
        throw this.error(`Unexpected character '${char}'`, start);
      }
      tokens.push({ type: tokenType, value: char, location: this.createLocation(start) });
    }

    tokens.push({
      type: TokenType.EOF,
      value: '',
      location: this.createLocation(this.createPosition())
    });

    return tokens;
  }
}
