/**
 * Template AST
 *
 * A template is literal text interleaved with `{{ expression }}` outputs.
 */

export interface TemplateDocument {
  type: 'template';
  parts: TemplatePart[];
}

export type TemplatePart = TextPart | OutputPart;

export interface TextPart {
  type: 'text';
  value: string;
}

export interface OutputPart {
  type: 'output';
  expression: TemplateExpression;
  line: number;
  column: number;
}

// ---
// EXPRESSIONS
// ---

export type TemplateExpression = LiteralExpression | VariableExpression | CallExpression;

/** `"text"`, `'text'`, `"""text"""` or a number */
export interface LiteralExpression {
  type: 'literal';
  value: string | number;
}

/** `experiment.slug` → ['experiment', 'slug'] */
export interface VariableExpression {
  type: 'variable';
  path: string[];
}

/** `agg_sum("active_hours")` */
export interface CallExpression {
  type: 'call';
  name: string;
  args: TemplateExpression[];
}

/** Source form of an expression, for error messages */
export function describeExpression(expression: TemplateExpression): string {
  switch (expression.type) {
    case 'literal':
      return typeof expression.value === 'string' ? JSON.stringify(expression.value) : String(expression.value);
    case 'variable':
      return expression.path.join('.');
    case 'call':
      return `${expression.name}(${expression.args.map(describeExpression).join(', ')})`;
  }
}
