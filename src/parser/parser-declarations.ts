import {
  ArgumentNode, Attribute, CallbackInterfaceDeclaration, ConstructorNode, Declaration, DictionaryDeclaration,
  DictionaryMember, EnumDeclaration, EnumVariantNode, InterfaceDeclaration, InterfaceMember, NamespaceDeclaration,
  OperationNode, SourceLocation, TypedefDeclaration, TypeExpression, VariantNode
} from '../types';
import { TokenType } from './lexer';
import type { Parser } from './parser';
import { parseLiteral, parseType } from './parser-types';

/**
 * Parse an extended attribute list such as `[Throws=StoreError, Threadsafe]`.
 * Returns an empty list when the next token does not open one.
 */
export function parseAttributes(parser: Parser): Attribute[] {
  const attributes: Attribute[] = [];
  if (!parser.match(TokenType.LEFT_BRACKET)) {
    return attributes;
  }

  do {
    const start = parser.getLocation();
    const name = parser.consume(TokenType.IDENTIFIER, 'Expected attribute name').value;
    let value: string | undefined;
    if (parser.match(TokenType.ASSIGN)) {
      value = parser.check(TokenType.STRING)
        ? parser.advance().value
        : parser.consumeName(`Expected value for attribute '${name}'`).value;
    }
    attributes.push({ name, value, location: parser.spanFrom(start) });
  } while (parser.match(TokenType.COMMA));

  parser.consume(TokenType.RIGHT_BRACKET, "Expected ']' after attributes");
  return attributes;
}

export function parseDeclaration(parser: Parser): Declaration {
  const start = parser.getLocation();
  const attributes = parseAttributes(parser);

  if (parser.match(TokenType.NAMESPACE)) {
    return parseNamespaceDeclaration(parser, attributes, start);
  }
  if (parser.match(TokenType.ENUM)) {
    return parseEnumDeclaration(parser, attributes, start);
  }
  if (parser.match(TokenType.DICTIONARY)) {
    return parseDictionaryDeclaration(parser, attributes, start);
  }
  if (parser.match(TokenType.INTERFACE)) {
    return parseInterfaceDeclaration(parser, attributes, start);
  }
  if (parser.match(TokenType.CALLBACK)) {
    parser.consume(TokenType.INTERFACE, "Expected 'interface' after 'callback'");
    return parseCallbackInterfaceDeclaration(parser, attributes, start);
  }
  if (parser.match(TokenType.TYPEDEF)) {
    return parseTypedefDeclaration(parser, attributes, start);
  }

  throw parser.error(`Expected declaration. Got '${parser.peek().value || 'end of input'}'`);
}

function parseDeclarationEnd(parser: Parser, what: string): void {
  parser.consume(TokenType.RIGHT_BRACE, `Expected '}' to close ${what}`);
  parser.consume(TokenType.SEMICOLON, `Expected ';' after ${what}`);
}

function parseNamespaceDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): NamespaceDeclaration<TypeExpression> {
  const name = parser.consumeName('Expected namespace name').value;
  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after namespace name");

  const functions: OperationNode<TypeExpression>[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    const memberStart = parser.getLocation();
    const memberAttributes = parseAttributes(parser);
    functions.push(parseOperation(parser, memberAttributes, memberStart));
  }

  parseDeclarationEnd(parser, `namespace '${name}'`);
  return { kind: 'namespace', name, functions, attributes, location: parser.spanFrom(start) };
}

function parseEnumDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): EnumDeclaration {
  const name = parser.consume(TokenType.IDENTIFIER, 'Expected enum name').value;
  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after enum name");

  const variants: EnumVariantNode[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE)) {
    const token = parser.consume(TokenType.STRING, 'Expected quoted enum variant name');
    variants.push({ name: token.value, location: token.location });
    if (!parser.match(TokenType.COMMA)) {
      break;
    }
  }

  if (variants.length === 0) {
    throw parser.error(`Enum '${name}' must declare at least one variant`);
  }

  parseDeclarationEnd(parser, `enum '${name}'`);
  return { kind: 'enum', name, variants, attributes, location: parser.spanFrom(start) };
}

function parseDictionaryDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): DictionaryDeclaration<TypeExpression> {
  const name = parser.consume(TokenType.IDENTIFIER, 'Expected dictionary name').value;
  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after dictionary name");

  const members: DictionaryMember<TypeExpression>[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    const memberStart = parser.getLocation();
    const memberAttributes = parseAttributes(parser);
    const required = parser.match(TokenType.REQUIRED);
    const type = parseType(parser);
    const fieldName = parser.consumeName('Expected field name').value;
    const defaultValue = parser.match(TokenType.ASSIGN) ? parseLiteral(parser) : undefined;
    parser.consume(TokenType.SEMICOLON, `Expected ';' after field '${fieldName}'`);
    members.push({
      name: fieldName,
      type,
      required,
      defaultValue,
      attributes: memberAttributes,
      location: parser.spanFrom(memberStart)
    });
  }

  parseDeclarationEnd(parser, `dictionary '${name}'`);
  return { kind: 'dictionary', name, members, attributes, location: parser.spanFrom(start) };
}

function parseInterfaceDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): InterfaceDeclaration<TypeExpression> {
  const name = parser.consume(TokenType.IDENTIFIER, 'Expected interface name').value;
  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after interface name");

  const members: InterfaceMember<TypeExpression>[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    const memberStart = parser.getLocation();
    const memberAttributes = parseAttributes(parser);
    if (parser.match(TokenType.CONSTRUCTOR)) {
      members.push(parseConstructor(parser, memberAttributes, memberStart));
    } else {
      members.push(parseOperationOrVariant(parser, memberAttributes, memberStart));
    }
  }

  parseDeclarationEnd(parser, `interface '${name}'`);
  return { kind: 'interface', name, members, attributes, location: parser.spanFrom(start) };
}

function parseCallbackInterfaceDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): CallbackInterfaceDeclaration<TypeExpression> {
  const name = parser.consume(TokenType.IDENTIFIER, 'Expected callback interface name').value;
  parser.consume(TokenType.LEFT_BRACE, "Expected '{' after callback interface name");

  const members: OperationNode<TypeExpression>[] = [];
  while (!parser.check(TokenType.RIGHT_BRACE) && !parser.isAtEnd()) {
    const memberStart = parser.getLocation();
    const memberAttributes = parseAttributes(parser);
    members.push(parseOperation(parser, memberAttributes, memberStart));
  }

  parseDeclarationEnd(parser, `callback interface '${name}'`);
  return { kind: 'callbackInterface', name, members, attributes, location: parser.spanFrom(start) };
}

function parseTypedefDeclaration(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): TypedefDeclaration<TypeExpression> {
  const type = parseType(parser);
  const name = parser.consume(TokenType.IDENTIFIER, 'Expected typedef name').value;
  parser.consume(TokenType.SEMICOLON, `Expected ';' after typedef '${name}'`);
  return { kind: 'typedef', name, type, attributes, location: parser.spanFrom(start) };
}

function parseConstructor(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): ConstructorNode<TypeExpression> {
  const args = parseArgumentList(parser, 'constructor');
  parser.consume(TokenType.SEMICOLON, "Expected ';' after constructor");
  return { kind: 'constructor', arguments: args, attributes, location: parser.spanFrom(start) };
}

export function parseOperation(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): OperationNode<TypeExpression> {
  const member = parseOperationOrVariant(parser, attributes, start);
  if (member.kind === 'variant') {
    throw parser.error(`Expected return type before '${member.name}'`, member.location);
  }
  return member;
}

/**
 * Parse `[static] (type | void) name(args);`, or the nameless `Variant(args);`
 * form that `[Enum]` and `[Error]` interfaces use for variants with fields.
 */
function parseOperationOrVariant(
  parser: Parser,
  attributes: Attribute[],
  start: SourceLocation
): OperationNode<TypeExpression> | VariantNode<TypeExpression> {
  const isStatic = parser.match(TokenType.STATIC);

  if (!isStatic && parser.check(TokenType.IDENTIFIER) && parser.checkNext(TokenType.LEFT_PAREN)) {
    const name = parser.advance().value;
    const args = parseArgumentList(parser, name);
    parser.consume(TokenType.SEMICOLON, `Expected ';' after variant '${name}'`);
    return { kind: 'variant', name, arguments: args, attributes, location: parser.spanFrom(start) };
  }

  const returnType = parser.match(TokenType.VOID) ? undefined : parseType(parser);
  const name = parser.consumeName('Expected operation name').value;
  const args = parseArgumentList(parser, name);
  parser.consume(TokenType.SEMICOLON, `Expected ';' after '${name}'`);

  return {
    kind: 'operation',
    name,
    returnType,
    arguments: args,
    attributes,
    isStatic,
    location: parser.spanFrom(start)
  };
}

export function parseArgumentList(parser: Parser, owner: string): ArgumentNode<TypeExpression>[] {
  parser.consume(TokenType.LEFT_PAREN, `Expected '(' after '${owner}'`);
  const args: ArgumentNode<TypeExpression>[] = [];

  if (!parser.check(TokenType.RIGHT_PAREN)) {
    do {
      const argStart = parser.getLocation();
      const attributes = parseAttributes(parser);
      const optional = parser.match(TokenType.OPTIONAL);
      const type = parseType(parser);
      const name = parser.consumeName('Expected argument name').value;
      const defaultValue = parser.match(TokenType.ASSIGN) ? parseLiteral(parser) : undefined;
      args.push({ name, type, optional, defaultValue, attributes, location: parser.spanFrom(argStart) });
    } while (parser.match(TokenType.COMMA));
  }

  parser.consume(TokenType.RIGHT_PAREN, `Expected ')' after arguments of '${owner}'`);
  return args;
}
