/**
 * Layer normalization
 *
 * Reads one raw layer (a nested mapping parsed from TOML) field by field into
 * typed overrides. Every known field is validated on its own: a bad value is
 * reported as MalformedOverride and skipped, so the rest of the entity still
 * takes part in the merge.
 */

import type { z } from 'zod';
import type {
  AnalysisPeriod,
  DataSourceDraft,
  ExperimentDraft,
  FunctionDraft,
  JoinDraft,
  Layer,
  MetricDraft,
  ParameterDraft,
  Section,
  SelectionDraft,
  StatisticParam,
} from '../definitions/records.js';
import {
  type ConfigError,
  type EntityRef,
  malformedOverride,
  unexpectedField,
} from '../definitions/errors.js';
import {
  analysisBasesSchema,
  asTable,
  booleanSchema,
  describeIssue,
  experimentsColumnTypeSchema,
  integerSchema,
  isoDateSchema,
  metricTypeSchema,
  parameterValueSchema,
  relationshipSchema,
  slugListSchema,
  statisticParamSchema,
  textSchema,
  type Table,
} from '../definitions/schema.js';

// ---
// OVERRIDE TYPES
// ---

/** What a layer says about one slug: remove it, or override some fields */
export type Update<D> =
  | { readonly kind: 'disable' }
  | { readonly kind: 'override'; readonly fields: D };

export interface DataSourceOverride extends Omit<DataSourceDraft, 'joins'> {
  joins: Map<string, Update<JoinDraft>>;
}

export interface LayerOverrides {
  readonly name: string;
  readonly dataSources: Map<string, Update<DataSourceOverride>>;
  readonly metrics: Map<string, Update<MetricDraft>>;
  readonly segments: Map<string, Update<SelectionDraft>>;
  readonly segmentDataSources: Map<string, Update<DataSourceOverride>>;
  readonly dimensions: Map<string, Update<SelectionDraft>>;
  readonly functions: Map<string, Update<FunctionDraft>>;
  readonly parameters: Map<string, Update<ParameterDraft>>;
  readonly statistics: Map<string, Record<string, StatisticParam>>;
  readonly analysisPeriods: Map<AnalysisPeriod, string[]>;
  readonly experiment: ExperimentDraft;
}

// ---
// SECTION KEYS
// ---

const ENTITY_SECTIONS = new Set([
  'data_sources',
  'metrics',
  'segments',
  'dimensions',
  'functions',
  'parameters',
  'statistics',
]);

/** Accepted at the top level of a layer but not used by the engine */
const IGNORED_SECTIONS = new Set([
  'project',
  'population',
  'alerts',
  'friendly_name',
  'description',
]);

const PERIOD_KEYS: Record<string, AnalysisPeriod> = {
  daily: 'daily',
  weekly: 'weekly',
  days28: 'days28',
  '28_day': 'days28',
  overall: 'overall',
};

const DATA_SOURCE_FIELDS = new Set([
  'from_expression',
  'client_id_column',
  'submission_date_column',
  'experiments_column_type',
  'default_dataset',
  'build_id_column',
  'friendly_name',
  'description',
  'joins',
  'disabled',
]);

const SEGMENT_DATA_SOURCE_FIELDS = new Set([...DATA_SOURCE_FIELDS, 'window_start', 'window_end']);

const JOIN_FIELDS = new Set(['on_expression', 'relationship', 'disabled']);

const METRIC_FIELDS = new Set([
  'data_source',
  'select_expression',
  'friendly_name',
  'description',
  'bigger_is_better',
  'type',
  'category',
  'analysis_bases',
  'statistics',
  'disabled',
]);

const SELECTION_FIELDS = new Set([
  'data_source',
  'select_expression',
  'friendly_name',
  'description',
  'disabled',
]);

const FUNCTION_FIELDS = new Set(['definition', 'disabled']);

const EXPERIMENT_FIELDS = new Set([
  'start_date',
  'end_date',
  'enrollment_period',
  'reference_branch',
  // accepted, used by analysis tooling downstream
  'enrollment_query',
  'segments',
  'skip',
  'exposure_signal',
  'is_private',
  'dataset_id',
]);

const PARAMETER_FIELDS = new Set(['value', 'distinct_by_branch', 'friendly_name', 'description', 'disabled']);

// ---
// FIELD READING
// ---

interface ReadContext {
  readonly layer: string;
  readonly errors: ConfigError[];
}

interface EntityContext extends ReadContext {
  readonly entity: EntityRef;
  /** Prepended to field names in messages, e.g. `joins.events.` */
  readonly fieldPrefix?: string;
}

/** Field names are case-insensitive */
function lowercaseKeys(table: Table): Table {
  const result: Table = {};
  for (const [key, value] of Object.entries(table)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Remove the indentation shared by all non-blank lines, and surrounding
 * blank lines. Multi-line TOML strings are usually indented with the file.
 */
export function dedent(text: string): string {
  const lines = text.split('\n');
  const indents = lines
    .filter(line => line.trim().length > 0)
    .map(line => /^[ \t]*/.exec(line)?.[0].length ?? 0);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines
    .map(line => line.slice(common))
    .join('\n')
    .replace(/^\s*\n/, '')
    .replace(/\n\s*$/, '');
}

function readField<T>(
  raw: Table,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ctx: EntityContext
): T | undefined {
  if (!(key in raw)) return undefined;
  const result = schema.safeParse(raw[key]);
  if (!result.success) {
    const field = `${ctx.fieldPrefix ?? ''}${key}`;
    ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, field, describeIssue(result.error)));
    return undefined;
  }
  return result.data;
}

function readText(raw: Table, key: string, ctx: EntityContext): string | undefined {
  return readField(raw, key, textSchema, ctx);
}

function readDescription(raw: Table, key: string, ctx: EntityContext): string | undefined {
  const value = readText(raw, key, ctx);
  return value === undefined ? undefined : dedent(value);
}

function reportUnexpected(raw: Table, allowed: ReadonlySet<string>, ctx: EntityContext): void {
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      ctx.errors.push(unexpectedField(ctx.layer, ctx.entity.section, key, ctx.entity.slug));
    }
  }
}

/**
 * Shared entry handling: lower-case keys, honor `disabled = true`, flag
 * unknown fields, then read the rest with `read`.
 */
function readEntity<D>(
  section: Section,
  slug: string,
  value: unknown,
  allowed: ReadonlySet<string>,
  ctx: ReadContext,
  read: (raw: Table, ctx: EntityContext) => D
): Update<D> | null {
  const entity: EntityRef = { section, slug };
  const entityCtx: EntityContext = { ...ctx, entity };
  const table = asTable(value);
  if (!table) {
    ctx.errors.push(malformedOverride(ctx.layer, entity, '*', 'must be a table'));
    return null;
  }
  const raw = lowercaseKeys(table);
  if (readField(raw, 'disabled', booleanSchema, entityCtx) === true) {
    return { kind: 'disable' };
  }
  reportUnexpected(raw, allowed, entityCtx);
  return { kind: 'override', fields: read(raw, entityCtx) };
}

// ---
// ENTITY READERS
// ---

function readJoins(raw: Table, ctx: EntityContext): Map<string, Update<JoinDraft>> {
  const joins = new Map<string, Update<JoinDraft>>();
  if (!('joins' in raw)) return joins;

  const table = asTable(raw.joins);
  if (!table) {
    ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, 'joins', 'must be a table of joins'));
    return joins;
  }

  for (const [target, value] of Object.entries(table)) {
    const joinTable = asTable(value);
    if (!joinTable) {
      ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, `joins.${target}`, 'must be a table'));
      continue;
    }
    const join = lowercaseKeys(joinTable);
    const joinCtx: EntityContext = { ...ctx, fieldPrefix: `joins.${target}.` };
    if (readField(join, 'disabled', booleanSchema, joinCtx) === true) {
      joins.set(target, { kind: 'disable' });
      continue;
    }
    for (const key of Object.keys(join)) {
      if (!JOIN_FIELDS.has(key)) {
        ctx.errors.push(unexpectedField(ctx.layer, ctx.entity.section, `joins.${target}.${key}`, ctx.entity.slug));
      }
    }
    joins.set(target, {
      kind: 'override',
      fields: {
        onExpression: readText(join, 'on_expression', joinCtx),
        relationship: readField(join, 'relationship', relationshipSchema, joinCtx),
      },
    });
  }
  return joins;
}

function readDataSource(raw: Table, ctx: EntityContext): DataSourceOverride {
  return {
    fromExpression: readText(raw, 'from_expression', ctx),
    clientIdColumn: readText(raw, 'client_id_column', ctx),
    submissionDateColumn: readText(raw, 'submission_date_column', ctx),
    experimentsColumnType: readField(raw, 'experiments_column_type', experimentsColumnTypeSchema, ctx),
    defaultDataset: readText(raw, 'default_dataset', ctx),
    buildIdColumn: readText(raw, 'build_id_column', ctx),
    friendlyName: readDescription(raw, 'friendly_name', ctx),
    description: readDescription(raw, 'description', ctx),
    joins: readJoins(raw, ctx),
  };
}

function readSegmentDataSource(raw: Table, ctx: EntityContext): DataSourceOverride {
  return {
    ...readDataSource(raw, ctx),
    windowStart: readField(raw, 'window_start', integerSchema, ctx),
    windowEnd: readField(raw, 'window_end', integerSchema, ctx),
  };
}

/** Statistic parameters, each validated on its own */
function readParams(
  table: Table,
  field: string,
  ctx: EntityContext
): Record<string, StatisticParam> {
  const params: Record<string, StatisticParam> = {};
  for (const [key, value] of Object.entries(table)) {
    const result = statisticParamSchema.safeParse(value);
    if (result.success) {
      params[key] = result.data;
    } else {
      ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, `${field}.${key}`, describeIssue(result.error)));
    }
  }
  return params;
}

function readStatistics(raw: Table, ctx: EntityContext): Map<string, Record<string, StatisticParam>> {
  const statistics = new Map<string, Record<string, StatisticParam>>();
  if (!('statistics' in raw)) return statistics;

  const table = asTable(raw.statistics);
  if (!table) {
    ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, 'statistics', 'must be a table of statistics'));
    return statistics;
  }
  for (const [name, value] of Object.entries(table)) {
    const params = asTable(value);
    if (!params) {
      ctx.errors.push(malformedOverride(ctx.layer, ctx.entity, `statistics.${name}`, 'must be a table'));
      continue;
    }
    statistics.set(name, readParams(params, `statistics.${name}`, ctx));
  }
  return statistics;
}

function readMetric(raw: Table, ctx: EntityContext): MetricDraft {
  return {
    dataSource: readText(raw, 'data_source', ctx),
    selectExpression: readText(raw, 'select_expression', ctx),
    friendlyName: readDescription(raw, 'friendly_name', ctx),
    description: readDescription(raw, 'description', ctx),
    biggerIsBetter: readField(raw, 'bigger_is_better', booleanSchema, ctx),
    type: readField(raw, 'type', metricTypeSchema, ctx),
    category: readText(raw, 'category', ctx),
    analysisBases: readField(raw, 'analysis_bases', analysisBasesSchema, ctx),
    statistics: readStatistics(raw, ctx),
  };
}

function readSelection(raw: Table, ctx: EntityContext): SelectionDraft {
  return {
    dataSource: readText(raw, 'data_source', ctx),
    selectExpression: readText(raw, 'select_expression', ctx),
    friendlyName: readDescription(raw, 'friendly_name', ctx),
    description: readDescription(raw, 'description', ctx),
  };
}

function readFunction(raw: Table, ctx: EntityContext): FunctionDraft {
  return { definition: readText(raw, 'definition', ctx) };
}

function readParameter(raw: Table, ctx: EntityContext): ParameterDraft {
  return {
    value: readField(raw, 'value', parameterValueSchema, ctx),
    distinctByBranch: readField(raw, 'distinct_by_branch', booleanSchema, ctx),
    friendlyName: readDescription(raw, 'friendly_name', ctx),
    description: readDescription(raw, 'description', ctx),
  };
}

function readExperiment(table: Table, overrides: LayerOverrides, ctx: ReadContext): void {
  const raw = lowercaseKeys(table);
  const entityCtx: EntityContext = { ...ctx, entity: { section: 'experiment', slug: '' } };
  for (const key of Object.keys(raw)) {
    if (!EXPERIMENT_FIELDS.has(key)) {
      ctx.errors.push(unexpectedField(ctx.layer, 'experiment', key));
    }
  }
  overrides.experiment.startDate = readField(raw, 'start_date', isoDateSchema, entityCtx);
  overrides.experiment.endDate = readField(raw, 'end_date', isoDateSchema, entityCtx);
  overrides.experiment.enrollmentPeriod = readField(raw, 'enrollment_period', integerSchema, entityCtx);
  overrides.experiment.referenceBranch = readText(raw, 'reference_branch', entityCtx);
}

// ---
// SECTION READERS
// ---

function readSection<D>(
  section: Section,
  table: Table,
  target: Map<string, Update<D>>,
  allowed: ReadonlySet<string>,
  ctx: ReadContext,
  read: (raw: Table, ctx: EntityContext) => D
): void {
  for (const [slug, value] of Object.entries(table)) {
    const update = readEntity(section, slug, value, allowed, ctx, read);
    if (update) target.set(slug, update);
  }
}

function readMetricsSection(table: Table, overrides: LayerOverrides, ctx: ReadContext): void {
  for (const [key, value] of Object.entries(table)) {
    const period = PERIOD_KEYS[key.toLowerCase()];
    if (period !== undefined && Array.isArray(value)) {
      const slugs = slugListSchema.safeParse(value);
      if (!slugs.success) {
        ctx.errors.push(
          malformedOverride(ctx.layer, { section: 'metrics', slug: key }, '*', describeIssue(slugs.error))
        );
        continue;
      }
      const existing = overrides.analysisPeriods.get(period) ?? [];
      overrides.analysisPeriods.set(period, [...existing, ...slugs.data]);
      continue;
    }
    const update = readEntity('metrics', key, value, METRIC_FIELDS, ctx, readMetric);
    if (update) overrides.metrics.set(key, update);
  }
}

function readSegmentsSection(table: Table, overrides: LayerOverrides, ctx: ReadContext): void {
  for (const [key, value] of Object.entries(table)) {
    if (key.toLowerCase() === 'data_sources') {
      const sources = asTable(value);
      if (!sources) {
        ctx.errors.push(unexpectedField(ctx.layer, 'segments', key));
        continue;
      }
      readSection(
        'segments.data_sources',
        sources,
        overrides.segmentDataSources,
        SEGMENT_DATA_SOURCE_FIELDS,
        ctx,
        readSegmentDataSource
      );
      continue;
    }
    const update = readEntity('segments', key, value, SELECTION_FIELDS, ctx, readSelection);
    if (update) overrides.segments.set(key, update);
  }
}

function readStatisticDefaults(table: Table, overrides: LayerOverrides, ctx: ReadContext): void {
  for (const [name, value] of Object.entries(table)) {
    const entityCtx: EntityContext = { ...ctx, entity: { section: 'statistics', slug: name } };
    const params = asTable(value);
    if (!params) {
      ctx.errors.push(malformedOverride(ctx.layer, entityCtx.entity, '*', 'must be a table'));
      continue;
    }
    overrides.statistics.set(name, readParams(params, 'params', entityCtx));
  }
}

/**
 * Read one layer into typed overrides. Problems are appended to `errors`.
 */
export function normalizeLayer(layer: Layer, errors: ConfigError[]): LayerOverrides {
  const ctx: ReadContext = { layer: layer.name, errors };
  const overrides: LayerOverrides = {
    name: layer.name,
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

  for (const [rawKey, value] of Object.entries(layer.definitions)) {
    const key = rawKey.toLowerCase();
    if (IGNORED_SECTIONS.has(key)) continue;

    const table = asTable(value);
    if (key === 'experiment' && table) {
      readExperiment(table, overrides, ctx);
      continue;
    }
    if (!ENTITY_SECTIONS.has(key) || !table) {
      errors.push(unexpectedField(layer.name, '(root)', rawKey));
      continue;
    }

    switch (key) {
      case 'data_sources':
        readSection('data_sources', table, overrides.dataSources, DATA_SOURCE_FIELDS, ctx, readDataSource);
        break;
      case 'metrics':
        readMetricsSection(table, overrides, ctx);
        break;
      case 'segments':
        readSegmentsSection(table, overrides, ctx);
        break;
      case 'dimensions':
        readSection('dimensions', table, overrides.dimensions, SELECTION_FIELDS, ctx, readSelection);
        break;
      case 'functions':
        readSection('functions', table, overrides.functions, FUNCTION_FIELDS, ctx, readFunction);
        break;
      case 'parameters':
        readSection('parameters', table, overrides.parameters, PARAMETER_FIELDS, ctx, readParameter);
        break;
      case 'statistics':
        readStatisticDefaults(table, overrides, ctx);
        break;
    }
  }

  return overrides;
}
