/**
 * Template rendering for SQL fragments.
 */

export { parseTemplate } from './template-parser.js';
export { renderTemplate, type TemplateScope, type TemplateValue } from './renderer.js';
export { TemplateError, type TemplateErrorKind } from './template-error.js';
export { BUILTIN_MACROS, macroTable, expandMacro, type MacroTable } from './functions.js';
export {
  experimentScope,
  lastEnrollmentDate,
  parameterScope,
  queryScope,
  renderParameterValue,
  resolveExperiment,
  type ExperimentContext,
} from './experiment-context.js';
export * from './template-ast.js';
