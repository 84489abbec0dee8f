import { describe, test, expect } from 'vitest';
import { Lexer, TokenType } from '../src/parser/lexer';
import { SchemaSyntaxError } from '../src/errors';

function tokenTypes(source: string): TokenType[] {
  return new Lexer(source).tokenize().map(token => token.type);
}

function lexError(source: string): SchemaSyntaxError {
  try {
    new Lexer(source, 'bad.idl').tokenize();
  } catch (error) {
    if (error instanceof SchemaSyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a syntax error');
}

describe('Lexer', () => {
  test('tokenizes a namespace function', () => {
    expect(tokenTypes('namespace math { u32 add(u32 a, u32 b); };')).toEqual([
      TokenType.NAMESPACE,
      TokenType.IDENTIFIER,
      TokenType.LEFT_BRACE,
      TokenType.IDENTIFIER,
      TokenType.IDENTIFIER,
      TokenType.LEFT_PAREN,
      TokenType.IDENTIFIER,
      TokenType.IDENTIFIER,
      TokenType.COMMA,
      TokenType.IDENTIFIER,
      TokenType.IDENTIFIER,
      TokenType.RIGHT_PAREN,
      TokenType.SEMICOLON,
      TokenType.RIGHT_BRACE,
      TokenType.SEMICOLON,
      TokenType.EOF
    ]);
  });

  test('recognizes keywords including constructor', () => {
    const tokens = new Lexer('constructor callback interface sequence record optional required').tokenize();
    expect(tokens.map(token => token.type)).toEqual([
      TokenType.CONSTRUCTOR,
      TokenType.CALLBACK,
      TokenType.INTERFACE,
      TokenType.SEQUENCE,
      TokenType.RECORD,
      TokenType.OPTIONAL,
      TokenType.REQUIRED,
      TokenType.EOF
    ]);
  });

  test('skips line and block comments', () => {
    const tokens = new Lexer('// leading\nnamespace /* inline */ geo').tokenize();
    expect(tokens.map(token => token.value)).toEqual(['namespace', 'geo', '']);
  });

  test('reads numeric literals', () => {
    const tokens = new Lexer('-42 0x1F 3.5 1e3 7').tokenize();
    expect(tokens.slice(0, 5).map(token => [token.type, token.value])).toEqual([
      [TokenType.INTEGER, '-42'],
      [TokenType.INTEGER, '0x1F'],
      [TokenType.FLOAT, '3.5'],
      [TokenType.FLOAT, '1e3'],
      [TokenType.INTEGER, '7']
    ]);
  });

  test('unescapes string literals', () => {
    const [token] = new Lexer('"say \\"hi\\"\\n"').tokenize();
    expect(token.type).toBe(TokenType.STRING);
    expect(token.value).toBe('say "hi"\n');
  });

  test('tracks line and column of each token', () => {
    const tokens = new Lexer('enum\n  Color', 'colors.idl').tokenize();
    expect(tokens[0].location).toEqual({
      start: { line: 1, column: 1 },
      end: { line: 1, column: 5 },
      filename: 'colors.idl'
    });
    expect(tokens[1].location.start).toEqual({ line: 2, column: 3 });
  });

  describe('errors', () => {
    test('unterminated string', () => {
      const error = lexError('"abc');
      expect(error.message).toBe('Unterminated string literal');
      expect(error.location?.start).toEqual({ line: 1, column: 1 });
      expect(error.location?.filename).toBe('bad.idl');
    });

    test('unterminated block comment', () => {
      expect(lexError('/* never closed').message).toBe('Unterminated block comment');
    });

    test('unknown escape sequence', () => {
      expect(lexError('"\\q"').message).toBe("Unknown escape sequence '\\q'");
    });

    test('unexpected character', () => {
      expect(lexError('namespace @').message).toBe("Unexpected character '@'");
    });

    test('letters glued to a number', () => {
      expect(lexError('12abc').message).toBe("Unexpected character 'a' after number '12'");
    });

    test('malformed hexadecimal and exponent', () => {
      expect(lexError('0x').message).toBe("Malformed hexadecimal literal '0x'");
      expect(lexError('1e').message).toBe("Malformed exponent in '1e'");
    });
  });
});
