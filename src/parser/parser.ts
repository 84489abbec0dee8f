// Parser for the interface schema language

import { SchemaSyntaxError } from '../errors';
import { Declaration, SchemaDocument, SourceLocation } from '../types';
import { isKeyword, Lexer, Token, TokenType } from './lexer';
import { parseDeclaration } from './parser-declarations';

export class Parser {
  public tokens: Token[];
  public current: number = 0;
  public filename: string;

  constructor(tokens: Token[], filename: string = 'input') {
    this.tokens = tokens;
    this.filename = filename;
    if (this.tokens.length === 0 || this.tokens[this.tokens.length - 1].type !== TokenType.EOF) {
      throw new Error('Token stream must end with an EOF token');
    }
  }

  /**
   * Parses the whole token stream. Purely syntactic: references to undeclared
   * types and duplicate names are left for later stages.
   */
  parse(): SchemaDocument {
    const declarations: Declaration[] = [];

    while (!this.isAtEnd()) {
      declarations.push(parseDeclaration(this));
    }

    return {
      kind: 'document',
      filename: this.filename,
      declarations
    };
  }

  public match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  public check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  public checkNext(type: TokenType): boolean {
    return this.peek(1).type === type;
  }

  public advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) {
      this.current++;
    }
    return token;
  }

  public isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  public peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.current + offset, this.tokens.length - 1)];
  }

  public previous(): Token {
    return this.tokens[Math.max(this.current - 1, 0)];
  }

  public consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(`${message}. Got '${this.describe(this.peek())}'`);
  }

  /** Accepts an identifier, or a keyword used where a plain name is expected. */
  public consumeName(message: string): Token {
    const token = this.peek();
    if (token.type === TokenType.IDENTIFIER || isKeyword(token.type)) {
      return this.advance();
    }
    throw this.error(`${message}. Got '${this.describe(token)}'`);
  }

  public error(message: string, location: SourceLocation = this.getLocation()): SchemaSyntaxError {
    return new SchemaSyntaxError(message, { location });
  }

  public getLocation(): SourceLocation {
    const token = this.peek();
    return {
      ...token.location,
      filename: this.filename
    };
  }

  /** Location spanning from `start` to the end of the last consumed token. */
  public spanFrom(start: SourceLocation): SourceLocation {
    return {
      start: start.start,
      end: this.previous().location.end,
      filename: this.filename
    };
  }

  private describe(token: Token): string {
    return token.type === TokenType.EOF ? 'end of input' : token.value;
  }
}

export function parseSchema(source: string, filename: string = 'input'): SchemaDocument {
  const tokens = new Lexer(source, filename).tokenize();
  return new Parser(tokens, filename).parse();
}
