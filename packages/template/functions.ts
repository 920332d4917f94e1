/**
 * Aggregation macros available to select expressions.
 *
 * A macro definition is SQL text with a `{select_expr}` placeholder, which is
 * replaced by the macro's single argument: `{{agg_sum("x")}}` with the
 * definition `COALESCE(SUM({select_expr}), 0)` renders `COALESCE(SUM(x), 0)`.
 */

import type { TemplateFunction } from '../definitions/records.js';

export const SELECT_EXPR_PLACEHOLDER = '{select_expr}';

/** macro name → definition */
export type MacroTable = ReadonlyMap<string, string>;

export const BUILTIN_MACROS: MacroTable = new Map([
  ['agg_sum', 'COALESCE(SUM({select_expr}), 0)'],
  ['agg_any', 'COALESCE(LOGICAL_OR({select_expr}), FALSE)'],
  [
    'agg_histogram_mean',
    [
      'SAFE_DIVIDE(',
      '  SUM(CAST(JSON_EXTRACT_SCALAR({select_expr}, "$.sum") AS int64)),',
      '  SUM((SELECT SUM(value) FROM UNNEST(mozfun.hist.extract({select_expr}).values)))',
      ')',
    ].join('\n'),
  ],
]);

/**
 * Built-in macros overlaid with the configured functions.
 * Configured functions win on a name clash.
 */
export function macroTable(functions: ReadonlyMap<string, TemplateFunction>): MacroTable {
  const macros = new Map(BUILTIN_MACROS);
  for (const fn of functions.values()) {
    macros.set(fn.slug, fn.definition);
  }
  return macros;
}

export function expandMacro(definition: string, argument: string): string {
  return definition.split(SELECT_EXPR_PLACEHOLDER).join(argument);
}
