/**
 * Template renderer
 *
 * Substitutes `{{ ... }}` outputs with values from a scope and expands macro
 * calls. Every missing variable or macro is an error; nothing is silently
 * defaulted.
 */

import { describeExpression, type OutputPart, type TemplateExpression } from './template-ast.js';
import { TemplateError } from './template-error.js';
import { parseTemplate } from './template-parser.js';
import { BUILTIN_MACROS, expandMacro, type MacroTable } from './functions.js';

export type TemplateValue = string | number | boolean | TemplateScope;

/** Nested variables, e.g. `{ experiment: { slug: 'x' } }` for `experiment.slug` */
export interface TemplateScope {
  readonly [name: string]: TemplateValue | undefined;
}

function lookup(scope: TemplateScope, path: readonly string[]): TemplateValue | undefined {
  let current: TemplateValue | undefined = scope;
  for (const segment of path) {
    if (typeof current !== 'object' || !Object.hasOwn(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
}

function evaluate(expression: TemplateExpression, scope: TemplateScope, macros: MacroTable, at: string): TemplateValue {
  switch (expression.type) {
    case 'literal':
      return expression.value;

    case 'variable': {
      const value = lookup(scope, expression.path);
      if (value === undefined) {
        throw new TemplateError(
          'MissingTemplateVariable',
          `Undefined template variable '${describeExpression(expression)}' at ${at}`
        );
      }
      return value;
    }

    case 'call': {
      const definition = macros.get(expression.name);
      if (definition === undefined) {
        throw new TemplateError('MissingTemplateVariable', `Undefined macro '${expression.name}' at ${at}`);
      }
      if (expression.args.length !== 1) {
        throw new TemplateError(
          'InvalidTemplateValue',
          `Macro '${expression.name}' takes exactly one argument, got ${expression.args.length} at ${at}`
        );
      }
      const [arg] = expression.args;
      return expandMacro(definition, stringify(evaluate(arg, scope, macros, at), arg, at));
    }
  }
}

function stringify(value: TemplateValue, expression: TemplateExpression, at: string): string {
  if (typeof value === 'object') {
    throw new TemplateError(
      'InvalidTemplateValue',
      `'${describeExpression(expression)}' is a namespace, not a value, at ${at}`
    );
  }
  return String(value);
}

function renderOutput(part: OutputPart, scope: TemplateScope, macros: MacroTable): string {
  const at = `line ${part.line}, column ${part.column}`;
  return stringify(evaluate(part.expression, scope, macros, at), part.expression, at);
}

/**
 * Render template text.
 *
 * @param macros Macro definitions by name (default: the built-in aggregation macros)
 * @throws TemplateError on syntax errors, missing variables or macros
 */
export function renderTemplate(source: string, scope: TemplateScope, macros: MacroTable = BUILTIN_MACROS): string {
  // plain SQL is the common case
  if (!source.includes('{')) {
    return source;
  }

  const document = parseTemplate(source);
  return document.parts.map(part => (part.type === 'text' ? part.value : renderOutput(part, scope, macros))).join('');
}
