import { Literal, LiteralNode, TypeExpression } from '../types';
import { TokenType } from './lexer';
import type { Parser } from './parser';

export function parseType(parser: Parser): TypeExpression {
  let type = parseBaseType(parser);

  // Nullable suffix; `T??` is syntactically fine and rejected by the resolver
  while (parser.match(TokenType.QUESTION)) {
    type = { kind: 'nullable', innerType: type, location: parser.spanFrom(type.location) };
  }

  return type;
}

function parseBaseType(parser: Parser): TypeExpression {
  const start = parser.getLocation();

  if (parser.match(TokenType.SEQUENCE)) {
    parser.consume(TokenType.LESS_THAN, "Expected '<' after 'sequence'");
    const elementType = parseType(parser);
    parser.consume(TokenType.GREATER_THAN, "Expected '>' after sequence element type");
    return { kind: 'sequence', elementType, location: parser.spanFrom(start) };
  }

  if (parser.match(TokenType.RECORD)) {
    parser.consume(TokenType.LESS_THAN, "Expected '<' after 'record'");
    const keyType = parseType(parser);
    parser.consume(TokenType.COMMA, "Expected ',' after record key type");
    const valueType = parseType(parser);
    parser.consume(TokenType.GREATER_THAN, "Expected '>' after record value type");
    return { kind: 'record', keyType, valueType, location: parser.spanFrom(start) };
  }

  if (parser.check(TokenType.IDENTIFIER)) {
    const nameToken = parser.advance();
    return { kind: 'named', name: nameToken.value, location: parser.spanFrom(start) };
  }

  throw parser.error(`Expected type. Got '${parser.peek().value || 'end of input'}'`);
}

function normalizeInteger(text: string): string {
  const negative = text.startsWith('-');
  const magnitude = BigInt(negative ? text.slice(1) : text);
  return (negative ? -magnitude : magnitude).toString();
}

export function parseLiteral(parser: Parser): LiteralNode {
  const start = parser.getLocation();
  const token = parser.peek();
  let literal: Literal;

  switch (token.type) {
    case TokenType.TRUE:
    case TokenType.FALSE:
      parser.advance();
      literal = { kind: 'boolean', value: token.type === TokenType.TRUE };
      break;
    case TokenType.NULL:
      parser.advance();
      literal = { kind: 'null' };
      break;
    case TokenType.INTEGER:
      parser.advance();
      literal = { kind: 'integer', value: normalizeInteger(token.value) };
      break;
    case TokenType.FLOAT:
      parser.advance();
      literal = { kind: 'float', value: Number(token.value) };
      break;
    case TokenType.STRING:
      parser.advance();
      literal = { kind: 'string', value: token.value };
      break;
    case TokenType.LEFT_BRACKET:
      parser.advance();
      parser.consume(TokenType.RIGHT_BRACKET, "Only the empty sequence '[]' is allowed as a default");
      literal = { kind: 'emptySequence' };
      break;
    case TokenType.LEFT_BRACE:
      parser.advance();
      parser.consume(TokenType.RIGHT_BRACE, "Only the empty record '{}' is allowed as a default");
      literal = { kind: 'emptyMap' };
      break;
    default:
      throw parser.error(`Expected literal value. Got '${token.value || 'end of input'}'`);
  }

  const location = parser.spanFrom(start);
  const text = token.type === TokenType.LEFT_BRACKET ? '[]'
    : token.type === TokenType.LEFT_BRACE ? '{}'
    : token.type === TokenType.STRING ? JSON.stringify(token.value)
    : token.value;
  return { literal, text, location };
}
