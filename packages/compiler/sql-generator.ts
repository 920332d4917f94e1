/**
 * SQL Generator
 *
 * Renders a QueryPlan to one SQL statement. Every configured fragment passes
 * through the template renderer, so aggregation macros, experiment variables
 * and parameters are substituted here and nowhere else.
 *
 * Output shape:
 * - one block: the block's SELECT alone
 * - several blocks: a WITH clause holding every block, then a SELECT that
 *   coalesces keys and dimensions and full-outer-joins each block onto the
 *   anchor
 */

import { KEY_COLUMNS, fromExpressionFor, type ResolvedConfiguration } from '../definitions/records.js';
import { renderTemplate, type TemplateScope } from '../template/renderer.js';
import { TemplateError } from '../template/template-error.js';
import { macroTable, type MacroTable } from '../template/functions.js';
import { queryScope, resolveExperiment, type ExperimentContext } from '../template/experiment-context.js';
import { sourcesFor } from './join-graph.js';
import type { AggregationBlock, BlockColumn, BlockJoin, QueryPlan } from './query-plan.js';

interface RenderContext {
  readonly plan: QueryPlan;
  readonly config: ResolvedConfiguration;
  readonly scope: TemplateScope;
  readonly macros: MacroTable;
}

function render(text: string, ctx: RenderContext): string {
  return renderTemplate(text, ctx.scope, ctx.macros);
}

function indent(text: string, prefix: string = '  '): string {
  return text
    .split('\n')
    .map(line => (line.length > 0 ? prefix + line : line))
    .join('\n');
}

// ---
// BLOCKS
// ---

function buildColumn(column: BlockColumn, ctx: RenderContext): string {
  const expression = render(column.expression, ctx);
  return expression === column.alias ? column.alias : `${expression} AS ${column.alias}`;
}

/** From expression of one data source, with `{dataset}` expanded and templates rendered */
function buildSource(slug: string, block: AggregationBlock, ctx: RenderContext): string {
  const source = sourcesFor(ctx.config, block.composition.section).get(slug);
  if (!source) {
    throw new Error(`Query plan references unknown data source '${slug}'`);
  }
  const from = fromExpressionFor(source, ctx.plan.dataset);
  if (from === null) {
    throw new TemplateError(
      'MissingTemplateVariable',
      `Data source '${slug}' uses {dataset} but the request names no dataset and no default_dataset is configured`
    );
  }
  return render(from, ctx);
}

function buildFrom(block: AggregationBlock, ctx: RenderContext): string {
  const { composition } = block;
  if (composition.edges.length === 0) {
    return buildSource(composition.root, block, ctx);
  }

  const lines: string[] = [];
  lines.push(`${buildSource(composition.root, block, ctx)} AS ${composition.root}`);
  for (const edge of composition.edges) {
    const right = buildSource(edge.right, block, ctx);
    lines.push(`FULL OUTER JOIN ${right} AS ${edge.right} ON ${render(edge.onExpression, ctx)}`);
  }
  return lines.join('\n');
}

/**
 * Build one aggregation block:
 * SELECT keys, dimensions, metrics FROM ... [WHERE ...] GROUP BY dimensions, keys
 */
function buildBlockSql(block: AggregationBlock, ctx: RenderContext): string {
  const parts: string[] = [];

  const columns = [...block.keys, ...block.dimensions, ...block.metrics].map(c => buildColumn(c, ctx));
  parts.push('SELECT');
  parts.push(indent(columns.join(',\n')));

  parts.push('FROM');
  parts.push(indent(buildFrom(block, ctx)));

  if (ctx.plan.where) {
    parts.push('WHERE');
    parts.push(indent(render(ctx.plan.where, ctx)));
  }

  const groupBy = [...block.dimensions.map(d => d.alias), ...block.keys.map(k => k.alias)];
  parts.push('GROUP BY');
  parts.push(indent(groupBy.join(', ')));

  return parts.join('\n');
}

// ---
// COMBINED STATEMENT
// ---

function buildJoin(join: BlockJoin): string {
  const conditions = join.columns.map(column => `${join.anchor}.${column} = ${join.block}.${column}`);
  return `FULL OUTER JOIN ${join.block} ON ${conditions.join(' AND ')}`;
}

function buildCombined(ctx: RenderContext): string {
  const { plan } = ctx;
  const parts: string[] = [];

  const ctes = plan.blocks.map(block => `${block.name} AS (\n${indent(buildBlockSql(block, ctx))}\n)`);
  parts.push(`WITH ${ctes.join(',\n')}`);

  const shared = [...KEY_COLUMNS, ...plan.groupBy.map(d => d.alias)];
  const columns = shared.map(column => {
    const sides = plan.blocks.map(block => `${block.name}.${column}`);
    return `COALESCE(${sides.join(', ')}) AS ${column}`;
  });
  for (const block of plan.blocks) {
    for (const metric of block.metrics) {
      columns.push(`${block.name}.${metric.alias}`);
    }
  }

  parts.push('SELECT');
  parts.push(indent(columns.join(',\n')));
  parts.push(`FROM ${plan.blocks[0].name}`);
  for (const join of plan.joins) {
    parts.push(buildJoin(join));
  }

  return parts.join('\n');
}

/**
 * Generate the SQL statement for a query plan.
 *
 * The same plan, configuration and context always produce identical text.
 * Experiment details from the configuration override those in `context`.
 *
 * @throws TemplateError when a template variable, macro or dataset is missing
 */
export function generateSql(plan: QueryPlan, config: ResolvedConfiguration, context?: ExperimentContext): string {
  if (plan.blocks.length === 0) {
    throw new Error(`Query plan has no ${plan.kind} to compute`);
  }

  const ctx: RenderContext = {
    plan,
    config,
    scope: queryScope(config.parameters, resolveExperiment(config.experiment, context)),
    macros: macroTable(config.functions),
  };

  if (plan.blocks.length === 1) {
    return buildBlockSql(plan.blocks[0], ctx);
  }
  return buildCombined(ctx);
}
