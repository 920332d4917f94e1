/**
 * Query Assembler
 *
 * Groups requested metrics by data source and builds one aggregation block
 * per data source, combined by full outer joins onto the first (anchor)
 * block.
 *
 * Problems affecting one data source exclude only that data source's
 * metrics; the rest of the request still produces a plan. Every exclusion
 * is listed with its reason.
 */

import { KEY_COLUMNS, type ResolvedConfiguration, type SourceSection } from '../definitions/records.js';
import {
  type ConfigError,
  cyclicJoinGraph,
  duplicateMetricName,
  invalidGroupBy,
  unknownDataSource,
  unknownMetric,
} from '../definitions/errors.js';
import { findCycles } from '../validator/join-cycles.js';
import { resolveJoinGraph, sourcesFor } from './join-graph.js';
import type {
  AggregationBlock,
  BlockColumn,
  BlockJoin,
  CompositionPlan,
  ExcludedEntity,
  QueryKind,
  QueryPlan,
} from './query-plan.js';

export interface QueryOptions {
  /** Ordered mapping of dimension name → SQL expression */
  groupBy?: Readonly<Record<string, string>>;

  /** Predicate applied inside every aggregation block */
  where?: string;

  /** Substituted for `{dataset}` in from expressions */
  dataset?: string;
}

export interface QueryRequest extends QueryOptions {
  metrics: readonly string[];
}

export interface SegmentRequest extends QueryOptions {
  segments: readonly string[];
}

export interface AssembleResult {
  plan: QueryPlan;
  errors: ConfigError[];
  excluded: ExcludedEntity[];
  warnings: string[];
}

/** The part of a metric or segment the assembler needs */
interface Selection {
  readonly slug: string;
  readonly dataSource: string;
  readonly selectExpression: string;
}

// ---
// BLOCK CONSTRUCTION
// ---

/**
 * Key columns of a block. A composed block coalesces each key across every
 * data source in the composition.
 */
function keyColumns(composition: CompositionPlan): BlockColumn[] {
  const [root] = composition.blocks;
  if (composition.blocks.length === 1) {
    return [
      { expression: root.clientIdColumn, alias: 'client_id' },
      { expression: root.submissionDateColumn, alias: 'submission_date' },
    ];
  }

  const clientIds = composition.blocks.map(b => `${b.dataSource}.${b.clientIdColumn}`);
  const dates = composition.blocks.map(b => `${b.dataSource}.${b.submissionDateColumn}`);
  return [
    { expression: `COALESCE(${clientIds.join(', ')})`, alias: 'client_id' },
    { expression: `COALESCE(${dates.join(', ')})`, alias: 'submission_date' },
  ];
}

function buildBlock(
  composition: CompositionPlan,
  groupBy: readonly BlockColumn[],
  selections: readonly Selection[]
): AggregationBlock {
  return {
    name: composition.root,
    composition,
    keys: keyColumns(composition),
    dimensions: groupBy,
    metrics: selections.map(s => ({ expression: s.selectExpression, alias: s.slug })),
  };
}

// ---
// ASSEMBLY
// ---

function assemble(
  kind: QueryKind,
  section: SourceSection,
  slugs: readonly string[],
  entities: ReadonlyMap<string, Selection>,
  options: QueryOptions,
  config: ResolvedConfiguration
): AssembleResult {
  const errors: ConfigError[] = [];
  const excluded: ExcludedEntity[] = [];
  const warnings: string[] = [];

  const exclude = (slug: string, error: ConfigError): void => {
    excluded.push({ section: kind, slug, kind: error.kind, reason: error.message });
  };

  // A dimension named like a key column, or like an earlier dimension, is dropped
  const groupBy: BlockColumn[] = [];
  const grouped = new Map<string, string>();
  for (const [alias, expression] of Object.entries(options.groupBy ?? {})) {
    const name = alias.toLowerCase();
    const key = KEY_COLUMNS.find(column => column === name);
    const earlier = grouped.get(name);
    if (key !== undefined) {
      errors.push(invalidGroupBy(alias, `collides with key column '${key}'`));
    } else if (earlier !== undefined) {
      errors.push(invalidGroupBy(alias, `collides with grouping dimension '${earlier}'`));
    } else {
      grouped.set(name, alias);
      groupBy.push({ expression, alias });
    }
  }
  const dimensionNames = groupBy.map(column => column.alias);

  // Partition by data source, first occurrence first
  const partitions = new Map<string, Selection[]>();
  for (const slug of new Set(slugs)) {
    const entity = entities.get(slug);
    if (!entity) {
      const error = unknownMetric(slug, kind);
      errors.push(error);
      exclude(slug, error);
      continue;
    }
    const members = partitions.get(entity.dataSource) ?? [];
    members.push(entity);
    partitions.set(entity.dataSource, members);
  }

  // Output column names already in use (SQL compares them case-insensitively)
  const taken = new Map<string, string>();
  for (const key of KEY_COLUMNS) taken.set(key, key);
  for (const name of dimensionNames) taken.set(name.toLowerCase(), name);

  const sources = sourcesFor(config, section);
  const blocks: AggregationBlock[] = [];

  for (const [dataSource, members] of partitions) {
    if (!sources.has(dataSource)) {
      for (const member of members) {
        const error = unknownDataSource(dataSource, { section: kind, slug: member.slug });
        errors.push(error);
        exclude(member.slug, error);
      }
      continue;
    }

    const cycles = findCycles(sources, [dataSource]).map(cycle => cyclicJoinGraph(section, cycle));
    if (cycles.length > 0) {
      errors.push(...cycles);
      for (const member of members) exclude(member.slug, cycles[0]);
      continue;
    }

    // Names are claimed only once the block is known to be built
    const claimed = new Map<string, string>();
    const accepted: Selection[] = [];
    for (const member of members) {
      const name = member.slug.toLowerCase();
      const owner = taken.get(name) ?? claimed.get(name);
      if (owner !== undefined) {
        const error = duplicateMetricName(name, [owner, member.slug]);
        errors.push(error);
        exclude(member.slug, error);
        continue;
      }
      claimed.set(name, member.slug);
      accepted.push(member);
    }
    if (accepted.length === 0) continue;

    const composition = resolveJoinGraph(dataSource, config, {
      section,
      metrics: accepted.map(s => s.slug),
    });
    warnings.push(...composition.warnings);
    if (composition.errors.length > 0) {
      errors.push(...composition.errors);
      for (const member of accepted) exclude(member.slug, composition.errors[0]);
      continue;
    }

    for (const [name, slug] of claimed) taken.set(name, slug);
    blocks.push(buildBlock(composition, groupBy, accepted));
  }

  const joins: BlockJoin[] = [];
  const [anchor, ...rest] = blocks;
  for (const block of rest) {
    joins.push({ anchor: anchor.name, block: block.name, columns: [...KEY_COLUMNS, ...dimensionNames] });
  }

  const plan: QueryPlan = {
    kind,
    blocks,
    joins,
    groupBy,
    where: options.where,
    dataset: options.dataset,
  };
  return { plan, errors, excluded, warnings };
}

/**
 * Assemble a metrics query.
 *
 * Requested slugs are de-duplicated; the data source of the first requested
 * metric anchors the outer-join chain.
 */
export function assembleQuery(request: QueryRequest, config: ResolvedConfiguration): AssembleResult {
  return assemble('metrics', 'data_sources', request.metrics, config.metrics, request, config);
}

/**
 * Assemble a segments query over segment data sources.
 */
export function assembleSegmentQuery(request: SegmentRequest, config: ResolvedConfiguration): AssembleResult {
  return assemble('segments', 'segments.data_sources', request.segments, config.segments, request, config);
}

// ---
// DEBUGGING
// ---

function printColumn(column: BlockColumn): string {
  return column.expression === column.alias ? column.alias : `${column.expression} AS ${column.alias}`;
}

/**
 * Print a query plan for debugging.
 */
export function printQueryPlan(plan: QueryPlan): string {
  const lines: string[] = [];
  lines.push(`QueryPlan (${plan.kind}):`);
  lines.push(`  Blocks: ${plan.blocks.length}`);
  if (plan.groupBy.length > 0) lines.push(`  groupBy: [${plan.groupBy.map(printColumn).join(', ')}]`);
  if (plan.where) lines.push(`  where: ${plan.where}`);
  if (plan.dataset) lines.push(`  dataset: ${plan.dataset}`);
  lines.push('');

  for (const block of plan.blocks) {
    const sources = block.composition.blocks.map(b => b.dataSource);
    lines.push(`  Block ${block.name}:`);
    lines.push(`    sources: [${sources.join(', ')}]`);
    lines.push(`    keys: [${block.keys.map(printColumn).join(', ')}]`);
    lines.push(`    metrics: [${block.metrics.map(m => m.alias).join(', ')}]`);
    lines.push('');
  }

  for (const join of plan.joins) {
    lines.push(`  FULL OUTER JOIN ${join.block} ON ${join.anchor} (${join.columns.join(', ')})`);
  }

  return lines.join('\n');
}
