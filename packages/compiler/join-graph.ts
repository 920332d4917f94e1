/**
 * Join Graph Resolver
 *
 * Expands a data source's declared joins, transitively, into a
 * CompositionPlan. Traversal is breadth-first in join declaration order and
 * never places a data source twice, so it terminates on cyclic graphs.
 */

import type { DataSource, ResolvedConfiguration, SourceSection } from '../definitions/records.js';
import { type ConfigError, unknownDataSource, unknownJoinTarget } from '../definitions/errors.js';
import type { CompositionBlock, CompositionEdge, CompositionPlan } from './query-plan.js';

export interface JoinGraphOptions {
  /** Namespace the root and its join targets live in (default: data_sources) */
  section?: SourceSection;

  /** Metric slugs computed from the root block */
  metrics?: readonly string[];
}

export function sourcesFor(
  config: ResolvedConfiguration,
  section: SourceSection
): ReadonlyMap<string, DataSource> {
  return section === 'data_sources' ? config.dataSources : config.segmentDataSources;
}

const COLUMN_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Columns a data source exposes for join conditions: the select expressions
 * of Dimension records declared on it that name a plain column, other than
 * its key columns. Request group-by aliases only exist after aggregation, so
 * they never take part.
 */
function exposedColumns(config: ResolvedConfiguration, section: SourceSection, source: DataSource): string[] {
  const exposed: string[] = [];
  if (section !== 'data_sources') return exposed;

  for (const dimension of config.dimensions.values()) {
    if (dimension.dataSource !== source.slug) continue;
    const column = dimension.selectExpression.trim();
    if (!COLUMN_NAME.test(column) || exposed.includes(column)) continue;
    if (column === source.clientIdColumn || column === source.submissionDateColumn) continue;
    exposed.push(column);
  }
  return exposed;
}

/**
 * Equality on client id, submission date, and every dimension column both
 * sides expose. Each side uses its own key column names.
 */
export function synthesizeCondition(left: CompositionBlock, right: CompositionBlock): string {
  const l = left.dataSource;
  const r = right.dataSource;
  const conjuncts = [
    `${l}.${left.clientIdColumn} = ${r}.${right.clientIdColumn}`,
    `${l}.${left.submissionDateColumn} = ${r}.${right.submissionDateColumn}`,
  ];
  for (const column of left.dimensions) {
    if (right.dimensions.includes(column)) {
      conjuncts.push(`${l}.${column} = ${r}.${column}`);
    }
  }
  return conjuncts.join(' AND ');
}

/**
 * Resolve the join graph rooted at `root`.
 *
 * Unknown join targets are dropped and reported as UnknownJoinTarget.
 * A target that is already in the plan is dropped with a warning.
 */
export function resolveJoinGraph(
  root: string,
  config: ResolvedConfiguration,
  options: JoinGraphOptions = {}
): CompositionPlan {
  const section = options.section ?? 'data_sources';
  const sources = sourcesFor(config, section);

  const errors: ConfigError[] = [];
  const warnings: string[] = [];
  const blocks: CompositionBlock[] = [];
  const edges: CompositionEdge[] = [];

  const rootSource = sources.get(root);
  if (!rootSource) {
    errors.push(unknownDataSource(root));
    return { root, section, blocks, edges, errors, warnings };
  }

  const placed = new Set<string>();
  const place = (source: DataSource, depth: number, metrics: readonly string[]): CompositionBlock => {
    const block: CompositionBlock = {
      dataSource: source.slug,
      depth,
      clientIdColumn: source.clientIdColumn,
      submissionDateColumn: source.submissionDateColumn,
      dimensions: exposedColumns(config, section, source),
      metrics,
    };
    blocks.push(block);
    placed.add(source.slug);
    return block;
  };

  const queue: CompositionBlock[] = [place(rootSource, 0, options.metrics ?? [])];

  while (queue.length > 0) {
    const left = queue.shift();
    if (!left) break;
    const leftSource = sources.get(left.dataSource);
    if (!leftSource) continue;

    for (const join of leftSource.joins.values()) {
      const targetSource = sources.get(join.target);
      if (!targetSource) {
        errors.push(unknownJoinTarget(section, left.dataSource, join.target));
        continue;
      }
      if (placed.has(join.target)) {
        warnings.push(
          `Dropped join ${left.dataSource} -> ${join.target}: '${join.target}' is already part of the composition for '${root}'`
        );
        continue;
      }

      const right = place(targetSource, left.depth + 1, []);
      edges.push({
        left: left.dataSource,
        right: right.dataSource,
        onExpression: join.onExpression ?? synthesizeCondition(left, right),
        relationship: join.relationship,
        synthesized: join.onExpression === undefined,
      });
      queue.push(right);
    }
  }

  return { root, section, blocks, edges, errors, warnings };
}

// ---
// DEBUGGING
// ---

/**
 * Print a composition plan for debugging.
 */
export function printCompositionPlan(plan: CompositionPlan): string {
  const lines: string[] = [];
  lines.push(`CompositionPlan (${plan.section}.${plan.root}):`);

  for (const block of plan.blocks) {
    let blockStr = `${'  '.repeat(block.depth + 1)}${block.dataSource}`;
    blockStr += ` [${block.clientIdColumn}, ${block.submissionDateColumn}`;
    if (block.dimensions.length > 0) blockStr += `, ${block.dimensions.join(', ')}`;
    blockStr += ']';
    if (block.metrics.length > 0) blockStr += ` metrics: ${block.metrics.join(', ')}`;
    lines.push(blockStr);
  }

  if (plan.edges.length > 0) {
    lines.push('  Edges:');
    for (const edge of plan.edges) {
      const origin = edge.synthesized ? 'synthesized' : 'explicit';
      lines.push(`    ${edge.left} -> ${edge.right} (${edge.relationship}, ${origin}): ${edge.onExpression}`);
    }
  }

  for (const error of plan.errors) lines.push(`  error: ${error.message}`);
  for (const warning of plan.warnings) lines.push(`  warning: ${warning}`);

  return lines.join('\n');
}
