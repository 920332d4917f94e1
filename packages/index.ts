/**
 * metric-layers - layered metric definitions compiled to analysis SQL
 *
 * Metrics, data sources, joins and segments are declared once in general
 * and overridden per platform, app or experiment. The layers merge into one
 * configuration, which compiles requested metrics into a single SQL
 * statement.
 *
 * @example
 * ```typescript
 * import { createMetricCompiler } from 'metric-layers';
 *
 * const compiler = await createMetricCompiler('./metric-config', {
 *   platform: 'desktop',
 *   experiment: 'onboarding-test',
 * });
 *
 * const { sql, excluded } = compiler.compile(
 *   { metrics: ['active_hours', 'days_of_use'], groupBy: { os: 'normalized_os' } },
 *   { slug: 'onboarding-test', startDate: '2024-03-01', enrollmentPeriod: 7 }
 * );
 * ```
 */

// definitions
export * from './definitions/index.js';

// loader
export {
  LayerLoadError,
  parseLayer,
  loadLayerFile,
  layerStackPaths,
  loadLayerStack,
  type LayerSelection,
} from './loader/index.js';

// merger + validator
export { mergeLayers, printConfiguration, type MergeResult } from './merger/index.js';
export { validateConfiguration, findCycles } from './validator/index.js';

// compiler
export {
  resolveJoinGraph,
  synthesizeCondition,
  assembleQuery,
  assembleSegmentQuery,
  generateSql,
  printCompositionPlan,
  printQueryPlan,
} from './compiler/index.js';
export type {
  CompositionPlan,
  CompositionBlock,
  CompositionEdge,
  QueryPlan,
  AggregationBlock,
  BlockColumn,
  BlockJoin,
  ExcludedEntity,
  JoinGraphOptions,
  QueryOptions,
  QueryRequest,
  SegmentRequest,
  AssembleResult,
} from './compiler/index.js';

// template
export {
  renderTemplate,
  parseTemplate,
  TemplateError,
  BUILTIN_MACROS,
  macroTable,
  experimentScope,
  type TemplateScope,
  type TemplateValue,
  type TemplateErrorKind,
  type MacroTable,
  type ExperimentContext,
} from './template/index.js';

// --- internal imports ---

import type { Layer, ResolvedConfiguration } from './definitions/records.js';
import { type ConfigError, ConfigurationError } from './definitions/errors.js';
import { loadLayerStack, type LayerSelection } from './loader/index.js';
import { mergeLayers, printConfiguration } from './merger/index.js';
import { validateConfiguration } from './validator/index.js';
import {
  assembleQuery,
  assembleSegmentQuery,
  generateSql,
  printCompositionPlan,
  printQueryPlan,
} from './compiler/index.js';
import type { AssembleResult, ExcludedEntity, QueryPlan, QueryRequest, SegmentRequest } from './compiler/index.js';
import type { ExperimentContext } from './template/index.js';

/**
 * Options for creating a MetricCompiler
 */
export interface MetricCompilerOptions {
  /**
   * Throw ConfigurationError instead of collecting problems:
   * on construction for merge and validation errors, on compile for
   * exclusions.
   */
  strict?: boolean;

  /** print each pipeline stage with console.log */
  debug?: boolean;
}

/**
 * Result of compiling a request
 */
export interface CompileResult {
  /** SQL statement, or null when every requested entity was excluded */
  sql: string | null;
  /** the plan the SQL was generated from */
  plan: QueryPlan;
  /** problems found while assembling this request */
  errors: ConfigError[];
  /** requested metrics or segments left out, with reasons */
  excluded: ExcludedEntity[];
  /** dropped join edges */
  warnings: string[];
}

/**
 * High-level API: merge and validate layers once, then compile requests.
 */
export class MetricCompiler {
  /** merged configuration */
  readonly config: ResolvedConfiguration;

  /** merge and validation problems */
  readonly errors: readonly ConfigError[];

  private options: MetricCompilerOptions;

  constructor(layers: readonly Layer[], options: MetricCompilerOptions = {}) {
    this.options = options;

    const merged = mergeLayers(layers);
    this.config = merged.config;
    this.errors = [...merged.errors, ...validateConfiguration(merged.config)];

    if (options.debug) {
      console.log(printConfiguration(this.config));
      for (const error of this.errors) {
        console.log(`  ${error.kind}: ${error.message}`);
      }
    }

    if (options.strict && this.errors.length > 0) {
      throw new ConfigurationError(this.errors);
    }
  }

  /** compile a metrics request to SQL */
  compile(request: QueryRequest, context?: ExperimentContext): CompileResult {
    return this.finish(assembleQuery(request, this.config), context);
  }

  /** compile a segments request to SQL */
  compileSegments(request: SegmentRequest, context?: ExperimentContext): CompileResult {
    return this.finish(assembleSegmentQuery(request, this.config), context);
  }

  private finish(result: AssembleResult, context?: ExperimentContext): CompileResult {
    const { plan, errors, excluded, warnings } = result;

    if (this.options.debug) {
      for (const block of plan.blocks) {
        console.log(printCompositionPlan(block.composition));
      }
      console.log(printQueryPlan(plan));
    }

    if (this.options.strict && errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    const sql = plan.blocks.length > 0 ? generateSql(plan, this.config, context) : null;

    if (this.options.debug && sql !== null) {
      console.log(sql);
    }

    return { sql, plan, errors, excluded, warnings };
  }
}

/**
 * Load a layer stack from a configuration directory and create a compiler.
 */
export async function createMetricCompiler(
  root: string,
  selection: LayerSelection,
  options: MetricCompilerOptions = {}
): Promise<MetricCompiler> {
  const layers = await loadLayerStack(root, selection);
  return new MetricCompiler(layers, options);
}
