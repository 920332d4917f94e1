/**
 * Template parser using Chevrotain
 *
 * Lexing runs in two modes: "text" outside of `{{ ... }}` and "expr" inside.
 * Statement and comment blocks (`{% ... %}`, `{# ... #}`) are not supported
 * and are rejected as syntax errors.
 */

import { createToken, CstParser, Lexer, type CstElement, type CstNode, type IToken } from 'chevrotain';
import type { TemplateDocument, TemplateExpression, TemplatePart } from './template-ast.js';
import { TemplateError } from './template-error.js';

// ---
// TOKEN DEFINITIONS
// ---

// Text mode
const OpenOutput = createToken({ name: 'OpenOutput', pattern: /\{\{/, push_mode: 'expr' });
const OpenStatement = createToken({ name: 'OpenStatement', pattern: /\{%/ });
const OpenComment = createToken({ name: 'OpenComment', pattern: /\{#/ });
const Brace = createToken({ name: 'Brace', pattern: /\{/ });
const Text = createToken({ name: 'Text', pattern: /[^{]+/, line_breaks: true });

// Expression mode
const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED, line_breaks: true });
const CloseOutput = createToken({ name: 'CloseOutput', pattern: /\}\}/, pop_mode: true });
const TripleString = createToken({
  name: 'TripleString',
  pattern: /"""[\s\S]*?"""|'''[\s\S]*?'''/,
  line_breaks: true,
});
const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/ });
const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+(?:\.\d+)?/ });
const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z_][a-zA-Z0-9_]*/ });
const Dot = createToken({ name: 'Dot', pattern: /\./ });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const Comma = createToken({ name: 'Comma', pattern: /,/ });

// Token order matters: `{{` before `{`, triple quotes before single quotes
const lexerDefinition = {
  modes: {
    text: [OpenOutput, OpenStatement, OpenComment, Brace, Text],
    expr: [WhiteSpace, CloseOutput, TripleString, StringLiteral, NumberLiteral, Identifier, Dot, LParen, RParen, Comma],
  },
  defaultMode: 'text',
};

const TemplateLexer = new Lexer(lexerDefinition);

// ---
// PARSER
// ---

class TemplateParser extends CstParser {
  constructor() {
    super(lexerDefinition);
    this.performSelfAnalysis();
  }

  public template = this.RULE('template', () => {
    this.MANY(() => {
      this.SUBRULE(this.part);
    });
  });

  public part = this.RULE('part', () => {
    this.OR([
      { ALT: () => this.CONSUME(Text) },
      { ALT: () => this.CONSUME(Brace) },
      { ALT: () => this.SUBRULE(this.output) },
    ]);
  });

  public output = this.RULE('output', () => {
    this.CONSUME(OpenOutput);
    this.SUBRULE(this.expression);
    this.CONSUME(CloseOutput);
  });

  public expression = this.RULE('expression', () => {
    this.OR([
      { ALT: () => this.CONSUME(TripleString) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.SUBRULE(this.reference) },
    ]);
  });

  // name, dotted path, or macro call: agg_sum(x)
  public reference = this.RULE('reference', () => {
    this.CONSUME(Identifier, { LABEL: 'segments' });
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Identifier, { LABEL: 'segments' });
    });
    this.OPTION(() => {
      this.SUBRULE(this.callArguments);
    });
  });

  public callArguments = this.RULE('callArguments', () => {
    this.CONSUME(LParen);
    this.MANY_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.expression, { LABEL: 'args' }),
    });
    this.CONSUME(RParen);
  });
}

const parserInstance = new TemplateParser();

// ---
// CST → AST
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function tokensOf(node: CstNode, name: string): IToken[] {
  return (node.children[name] ?? []).filter(isToken);
}

function nodesOf(node: CstNode, name: string): CstNode[] {
  return (node.children[name] ?? []).filter((element): element is CstNode => !isToken(element));
}

function unquote(image: string): string {
  if (image.startsWith('"""') || image.startsWith("'''")) {
    return image.slice(3, -3);
  }
  return image.slice(1, -1).replace(/\\(.)/g, (_match, char: string) => {
    if (char === 'n') return '\n';
    if (char === 't') return '\t';
    return char;
  });
}

function toExpression(node: CstNode): TemplateExpression {
  const literal = tokensOf(node, 'TripleString')[0] ?? tokensOf(node, 'StringLiteral')[0];
  if (literal) {
    return { type: 'literal', value: unquote(literal.image) };
  }

  const number = tokensOf(node, 'NumberLiteral')[0];
  if (number) {
    return { type: 'literal', value: Number(number.image) };
  }

  const reference = nodesOf(node, 'reference')[0];
  if (!reference) {
    throw new Error('Unexpected expression structure');
  }

  const path = tokensOf(reference, 'segments').map(token => token.image);
  const call = nodesOf(reference, 'callArguments')[0];
  if (call) {
    return { type: 'call', name: path.join('.'), args: nodesOf(call, 'args').map(toExpression) };
  }
  return { type: 'variable', path };
}

function toPart(node: CstNode): TemplatePart {
  const text = tokensOf(node, 'Text')[0] ?? tokensOf(node, 'Brace')[0];
  if (text) {
    return { type: 'text', value: text.image };
  }

  const output = nodesOf(node, 'output')[0];
  const open = output ? tokensOf(output, 'OpenOutput')[0] : undefined;
  const expression = output ? nodesOf(output, 'expression')[0] : undefined;
  if (!open || !expression) {
    throw new Error('Unexpected template part structure');
  }
  return {
    type: 'output',
    expression: toExpression(expression),
    line: open.startLine ?? 0,
    column: open.startColumn ?? 0,
  };
}

/** Merge adjacent text parts, so a lone `{` does not split literal text */
function coalesceText(parts: TemplatePart[]): TemplatePart[] {
  const merged: TemplatePart[] = [];
  for (const part of parts) {
    const last = merged[merged.length - 1];
    if (part.type === 'text' && last?.type === 'text') {
      merged[merged.length - 1] = { type: 'text', value: last.value + part.value };
    } else {
      merged.push(part);
    }
  }
  return merged;
}

// ---
// PUBLIC API
// ---

function syntaxError(line: number | undefined, column: number | undefined, message: string): TemplateError {
  // the end-of-input token carries no position
  const at =
    line !== undefined && Number.isFinite(line)
      ? `line ${line}, column ${column ?? 0}`
      : 'end of template';
  return new TemplateError('TemplateSyntax', `Template syntax error at ${at}: ${message}`);
}

/**
 * Parse template text into a TemplateDocument.
 * Throws TemplateError('TemplateSyntax') on lexing or parsing errors.
 */
export function parseTemplate(source: string): TemplateDocument {
  const lexResult = TemplateLexer.tokenize(source);
  const lexError = lexResult.errors[0];
  if (lexError) {
    throw syntaxError(lexError.line, lexError.column, lexError.message);
  }

  const unsupported = lexResult.tokens.find(
    token => token.tokenType === OpenStatement || token.tokenType === OpenComment
  );
  if (unsupported) {
    throw syntaxError(
      unsupported.startLine,
      unsupported.startColumn,
      `unsupported block '${unsupported.image}'`
    );
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.template();

  const parseError = parserInstance.errors[0];
  if (parseError) {
    throw syntaxError(parseError.token.startLine, parseError.token.startColumn, parseError.message);
  }

  return { type: 'template', parts: coalesceText(nodesOf(cst, 'part').map(toPart)) };
}

// Export for testing/debugging
export { TemplateLexer, TemplateParser };
