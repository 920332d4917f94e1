/**
 * Layer Merger
 *
 * Combines ordered configuration layers (general → platform → app →
 * experiment) into one ResolvedConfiguration.
 *
 * Rules, applied per slug and per layer in the given order:
 * - a new slug is inserted with the fields it declares
 * - an existing slug is overridden field by field; absent fields stay
 * - `joins` and `statistics` merge key by key with the same rule
 * - `disabled = true` removes the slug (or the single join)
 * - an empty body is a no-op
 *
 * Defaults are applied once, after the last layer (see definitions/defaults.ts).
 */

import type {
  AnalysisPeriod,
  DataSource,
  DataSourceDraft,
  Dimension,
  ExperimentDraft,
  FunctionDraft,
  JoinDraft,
  Layer,
  Metric,
  MetricDraft,
  Parameter,
  ParameterDraft,
  ResolvedConfiguration,
  Section,
  Segment,
  SegmentDataSource,
  SelectionDraft,
  Statistic,
  StatisticParam,
  TemplateFunction,
} from '../definitions/records.js';
import { type ConfigError, malformedOverride } from '../definitions/errors.js';
import {
  type Finalized,
  finalizeDataSource,
  finalizeDimension,
  finalizeFunction,
  finalizeMetric,
  finalizeParameter,
  finalizeSegment,
  finalizeSegmentDataSource,
} from '../definitions/defaults.js';
import { normalizeLayer, type DataSourceOverride, type LayerOverrides, type Update } from './normalize.js';

export interface MergeResult {
  readonly config: ResolvedConfiguration;
  readonly errors: readonly ConfigError[];
}

/** Drafts accumulated across layers */
interface MergeState {
  readonly dataSources: Map<string, DataSourceDraft>;
  readonly metrics: Map<string, MetricDraft>;
  readonly segments: Map<string, SelectionDraft>;
  readonly segmentDataSources: Map<string, DataSourceDraft>;
  readonly dimensions: Map<string, SelectionDraft>;
  readonly functions: Map<string, FunctionDraft>;
  readonly parameters: Map<string, ParameterDraft>;
  readonly statistics: Map<string, Record<string, StatisticParam>>;
  readonly analysisPeriods: Map<AnalysisPeriod, string[]>;
  readonly experiment: ExperimentDraft;
}

// ---
// FIELD-LEVEL OVERRIDE
// ---

// Each override copies a field only when the later layer declares it
// (`undefined` means "not declared in this layer").

function overrideJoin(draft: JoinDraft, fields: JoinDraft): void {
  draft.onExpression = fields.onExpression ?? draft.onExpression;
  draft.relationship = fields.relationship ?? draft.relationship;
}

function overrideDataSource(draft: DataSourceDraft, fields: DataSourceOverride): void {
  draft.fromExpression = fields.fromExpression ?? draft.fromExpression;
  draft.clientIdColumn = fields.clientIdColumn ?? draft.clientIdColumn;
  draft.submissionDateColumn = fields.submissionDateColumn ?? draft.submissionDateColumn;
  draft.experimentsColumnType = fields.experimentsColumnType ?? draft.experimentsColumnType;
  draft.defaultDataset = fields.defaultDataset ?? draft.defaultDataset;
  draft.buildIdColumn = fields.buildIdColumn ?? draft.buildIdColumn;
  draft.friendlyName = fields.friendlyName ?? draft.friendlyName;
  draft.description = fields.description ?? draft.description;
  draft.windowStart = fields.windowStart ?? draft.windowStart;
  draft.windowEnd = fields.windowEnd ?? draft.windowEnd;
  overrideJoins(draft.joins, fields.joins);
}

function overrideMetricFields(draft: MetricDraft, fields: MetricDraft): void {
  draft.dataSource = fields.dataSource ?? draft.dataSource;
  draft.selectExpression = fields.selectExpression ?? draft.selectExpression;
  draft.friendlyName = fields.friendlyName ?? draft.friendlyName;
  draft.description = fields.description ?? draft.description;
  draft.biggerIsBetter = fields.biggerIsBetter ?? draft.biggerIsBetter;
  draft.type = fields.type ?? draft.type;
  draft.category = fields.category ?? draft.category;
  draft.analysisBases = fields.analysisBases ?? draft.analysisBases;
}

function overrideSelection(draft: SelectionDraft, fields: SelectionDraft): void {
  draft.dataSource = fields.dataSource ?? draft.dataSource;
  draft.selectExpression = fields.selectExpression ?? draft.selectExpression;
  draft.friendlyName = fields.friendlyName ?? draft.friendlyName;
  draft.description = fields.description ?? draft.description;
}

function overrideFunction(draft: FunctionDraft, fields: FunctionDraft): void {
  draft.definition = fields.definition ?? draft.definition;
}

function overrideParameter(draft: ParameterDraft, fields: ParameterDraft): void {
  draft.value = fields.value ?? draft.value;
  draft.distinctByBranch = fields.distinctByBranch ?? draft.distinctByBranch;
  draft.friendlyName = fields.friendlyName ?? draft.friendlyName;
  draft.description = fields.description ?? draft.description;
}

function overrideExperiment(draft: ExperimentDraft, fields: ExperimentDraft): void {
  draft.startDate = fields.startDate ?? draft.startDate;
  draft.endDate = fields.endDate ?? draft.endDate;
  draft.enrollmentPeriod = fields.enrollmentPeriod ?? draft.enrollmentPeriod;
  draft.referenceBranch = fields.referenceBranch ?? draft.referenceBranch;
}

function paramKind(value: StatisticParam): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Merge statistic parameters key by key. A parameter whose value type
 * differs from the established one is rejected as MalformedOverride.
 */
function overrideParams(
  target: Record<string, StatisticParam>,
  params: Readonly<Record<string, StatisticParam>>,
  report: (param: string, reason: string) => void
): void {
  for (const [key, value] of Object.entries(params)) {
    const existing = target[key];
    if (existing !== undefined && paramKind(existing) !== paramKind(value)) {
      report(key, `changes type from ${paramKind(existing)} to ${paramKind(value)}`);
      continue;
    }
    target[key] = value;
  }
}

function overrideStatistics(
  target: Map<string, Record<string, StatisticParam>>,
  statistics: ReadonlyMap<string, Record<string, StatisticParam>>,
  report: (field: string, reason: string) => void
): void {
  for (const [name, params] of statistics) {
    const existing = target.get(name);
    if (!existing) {
      target.set(name, { ...params });
      continue;
    }
    overrideParams(existing, params, (param, reason) => report(`statistics.${name}.${param}`, reason));
  }
}

function overrideJoins(target: Map<string, JoinDraft>, joins: ReadonlyMap<string, Update<JoinDraft>>): void {
  for (const [slug, update] of joins) {
    if (update.kind === 'disable') {
      target.delete(slug);
      continue;
    }
    const existing = target.get(slug);
    if (existing) {
      overrideJoin(existing, update.fields);
    } else {
      target.set(slug, { ...update.fields });
    }
  }
}

// ---
// PER-SECTION APPLICATION
// ---

/**
 * Apply one layer's updates for a section.
 * `create` builds a fresh draft for a new slug; `apply` overrides an existing one.
 */
function applyUpdates<D, O>(
  target: Map<string, D>,
  updates: ReadonlyMap<string, Update<O>>,
  create: () => D,
  apply: (draft: D, fields: O, slug: string) => void
): void {
  for (const [slug, update] of updates) {
    if (update.kind === 'disable') {
      target.delete(slug);
      continue;
    }
    let draft = target.get(slug);
    if (draft === undefined) {
      draft = create();
      target.set(slug, draft);
    }
    apply(draft, update.fields, slug);
  }
}

function applyLayer(state: MergeState, layer: LayerOverrides, errors: ConfigError[]): void {
  const reporter = (section: Section, slug: string) => (field: string, reason: string) => {
    errors.push(malformedOverride(layer.name, { section, slug }, field, reason));
  };

  applyUpdates(state.dataSources, layer.dataSources, () => ({ joins: new Map() }), overrideDataSource);
  applyUpdates(state.segmentDataSources, layer.segmentDataSources, () => ({ joins: new Map() }), overrideDataSource);

  applyUpdates(
    state.metrics,
    layer.metrics,
    () => ({ statistics: new Map() }),
    (draft, fields, slug) => {
      overrideMetricFields(draft, fields);
      overrideStatistics(draft.statistics, fields.statistics, reporter('metrics', slug));
    }
  );

  applyUpdates(state.segments, layer.segments, () => ({}), overrideSelection);
  applyUpdates(state.dimensions, layer.dimensions, () => ({}), overrideSelection);
  applyUpdates(state.functions, layer.functions, () => ({}), overrideFunction);
  applyUpdates(state.parameters, layer.parameters, () => ({}), overrideParameter);

  for (const [name, params] of layer.statistics) {
    const existing = state.statistics.get(name);
    if (existing) {
      overrideParams(existing, params, reporter('statistics', name));
    } else {
      state.statistics.set(name, { ...params });
    }
  }

  overrideExperiment(state.experiment, layer.experiment);

  // period lists append; a slug listed twice keeps its first position
  for (const [period, slugs] of layer.analysisPeriods) {
    const existing = state.analysisPeriods.get(period) ?? [];
    const merged = [...existing];
    for (const slug of slugs) {
      if (!merged.includes(slug)) merged.push(slug);
    }
    state.analysisPeriods.set(period, merged);
  }
}

// ---
// FINALIZATION
// ---

function finalizeAll<D, R>(
  drafts: ReadonlyMap<string, D>,
  finalize: (slug: string, draft: D) => Finalized<R>,
  errors: ConfigError[]
): Map<string, R> {
  const records = new Map<string, R>();
  for (const [slug, draft] of drafts) {
    const result = finalize(slug, draft);
    if (result.ok) {
      records.set(slug, result.record);
    } else {
      errors.push(result.error);
    }
  }
  return records;
}

function finalizeStatisticDefaults(drafts: ReadonlyMap<string, Record<string, StatisticParam>>): Map<string, Statistic> {
  const statistics = new Map<string, Statistic>();
  for (const [name, params] of drafts) {
    statistics.set(name, { name, params: { ...params } });
  }
  return statistics;
}

/**
 * Merge layers, general first and most specific last.
 *
 * Layer order is significant; the order of slugs within a layer is not.
 * The same layers always produce an identical configuration.
 */
export function mergeLayers(layers: readonly Layer[]): MergeResult {
  const errors: ConfigError[] = [];
  const state: MergeState = {
    dataSources: new Map(),
    metrics: new Map(),
    segments: new Map(),
    segmentDataSources: new Map(),
    dimensions: new Map(),
    functions: new Map(),
    parameters: new Map(),
    statistics: new Map(),
    analysisPeriods: new Map(),
    experiment: {},
  };

  for (const layer of layers) {
    applyLayer(state, normalizeLayer(layer, errors), errors);
  }

  const config: ResolvedConfiguration = {
    dataSources: finalizeAll<DataSourceDraft, DataSource>(state.dataSources, finalizeDataSource, errors),
    metrics: finalizeAll<MetricDraft, Metric>(state.metrics, finalizeMetric, errors),
    segments: finalizeAll<SelectionDraft, Segment>(state.segments, finalizeSegment, errors),
    segmentDataSources: finalizeAll<DataSourceDraft, SegmentDataSource>(
      state.segmentDataSources,
      finalizeSegmentDataSource,
      errors
    ),
    dimensions: finalizeAll<SelectionDraft, Dimension>(state.dimensions, finalizeDimension, errors),
    statistics: finalizeStatisticDefaults(state.statistics),
    functions: finalizeAll<FunctionDraft, TemplateFunction>(state.functions, finalizeFunction, errors),
    parameters: finalizeAll<ParameterDraft, Parameter>(state.parameters, finalizeParameter, errors),
    analysisPeriods: new Map(state.analysisPeriods),
    experiment: { ...state.experiment },
    layers: layers.map(layer => layer.name),
  };

  return { config, errors };
}

// ---
// DEBUGGING
// ---

/**
 * Print a resolved configuration for debugging.
 */
export function printConfiguration(config: ResolvedConfiguration): string {
  const lines: string[] = [];
  lines.push('ResolvedConfiguration:');
  lines.push(`  layers: [${config.layers.join(', ')}]`);

  lines.push('');
  lines.push('  Data Sources:');
  for (const source of config.dataSources.values()) {
    lines.push(`    ${source.slug}: ${source.fromExpression}`);
    for (const join of source.joins.values()) {
      let joinStr = `      JOIN ${join.target} (${join.relationship})`;
      if (join.onExpression) joinStr += ` ON ${join.onExpression}`;
      lines.push(joinStr);
    }
  }

  lines.push('');
  lines.push('  Metrics:');
  for (const metric of config.metrics.values()) {
    let metricStr = `    ${metric.slug} [${metric.dataSource}]: ${metric.selectExpression}`;
    if (metric.statistics.size > 0) metricStr += ` {${[...metric.statistics.keys()].join(', ')}}`;
    lines.push(metricStr);
  }

  if (config.segments.size > 0) {
    lines.push('');
    lines.push('  Segments:');
    for (const segment of config.segments.values()) {
      lines.push(`    ${segment.slug} [${segment.dataSource}]: ${segment.selectExpression}`);
    }
  }

  if (config.dimensions.size > 0) {
    lines.push('');
    lines.push('  Dimensions:');
    for (const dimension of config.dimensions.values()) {
      lines.push(`    ${dimension.slug} [${dimension.dataSource}]: ${dimension.selectExpression}`);
    }
  }

  const experimentFields: [string, string | number | undefined][] = [
    ['start_date', config.experiment.startDate],
    ['end_date', config.experiment.endDate],
    ['enrollment_period', config.experiment.enrollmentPeriod],
    ['reference_branch', config.experiment.referenceBranch],
  ];
  const experiment = experimentFields.filter(([, value]) => value !== undefined);
  if (experiment.length > 0) {
    lines.push('');
    lines.push(`  Experiment: ${experiment.map(([key, value]) => `${key}=${value}`).join(', ')}`);
  }

  if (config.functions.size > 0) {
    lines.push('');
    lines.push(`  Functions: [${[...config.functions.keys()].join(', ')}]`);
  }

  return lines.join('\n');
}
