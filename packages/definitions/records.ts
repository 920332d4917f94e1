/**
 * Definition Records
 *
 * Immutable value objects produced by merging configuration layers.
 * Every record is keyed by its slug inside a ResolvedConfiguration.
 *
 * Drafts (the `*Draft` types) are the partially specified shapes that the
 * Layer Merger accumulates while walking layers; they become records once
 * defaults are applied (see defaults.ts).
 */

// ---
// ENUMERATIONS
// ---

export const RELATIONSHIPS = ['one_to_one', 'one_to_many', 'many_to_one', 'many_to_many'] as const;
export type Relationship = (typeof RELATIONSHIPS)[number];

/**
 * How experiment membership is stored in a data source:
 * - 'simple': `experiments` column mapping slug → branch name
 * - 'native': `experiments` column mapping slug → struct with a `branch` field
 * - 'glean': Glean-style experiments struct
 * - 'none': no experiments column at all
 */
export const EXPERIMENTS_COLUMN_TYPES = ['none', 'simple', 'native', 'glean'] as const;
export type ExperimentsColumnType = (typeof EXPERIMENTS_COLUMN_TYPES)[number];

export const METRIC_TYPES = ['scalar', 'histogram'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export const ANALYSIS_BASES = ['enrollments', 'exposures'] as const;
export type AnalysisBasis = (typeof ANALYSIS_BASES)[number];

export const ANALYSIS_PERIODS = ['daily', 'weekly', 'days28', 'overall'] as const;
export type AnalysisPeriod = (typeof ANALYSIS_PERIODS)[number];

/** Sections of a configuration layer; all but `experiment` hold slug-keyed entities */
export type Section =
  | 'data_sources'
  | 'metrics'
  | 'segments'
  | 'segments.data_sources'
  | 'dimensions'
  | 'functions'
  | 'parameters'
  | 'statistics'
  | 'experiment';

/** The two namespaces of joinable data sources */
export type SourceSection = 'data_sources' | 'segments.data_sources';

// ---
// RECORDS
// ---

export type ScalarParam = string | number | boolean;

/** A parametrised list entry, e.g. `{ name = "remove_outliers", fraction = 0.9999 }` */
export type NamedParam = Readonly<{ name: string } & Record<string, ScalarParam>>;

export type StatisticParam = ScalarParam | readonly (ScalarParam | NamedParam)[];

export interface Join {
  /** Slug of the joined data source */
  readonly target: string;

  /** Explicit SQL join condition; synthesized from key columns when absent */
  readonly onExpression?: string;

  readonly relationship: Relationship;
}

export interface DataSource {
  readonly slug: string;

  /** Table name or subquery. May contain a `{dataset}` placeholder. */
  readonly fromExpression: string;

  readonly clientIdColumn: string;
  readonly submissionDateColumn: string;
  readonly experimentsColumnType: ExperimentsColumnType;

  /** Value substituted for `{dataset}` when the request names none */
  readonly defaultDataset?: string;

  readonly buildIdColumn: string;
  readonly friendlyName?: string;
  readonly description?: string;

  /** Joins keyed by target slug, in declaration order */
  readonly joins: ReadonlyMap<string, Join>;
}

/**
 * Segment data sources share the DataSource shape and add an
 * enrollment-relative window (in days).
 */
export interface SegmentDataSource extends DataSource {
  readonly windowStart: number;
  readonly windowEnd: number;
}

export interface Statistic {
  readonly name: string;
  readonly params: Readonly<Record<string, StatisticParam>>;
}

export interface Metric {
  /** Also the output column name */
  readonly slug: string;
  readonly dataSource: string;

  /** SQL expression template, may call aggregation macros */
  readonly selectExpression: string;

  readonly friendlyName?: string;
  readonly description?: string;
  readonly biggerIsBetter: boolean;
  readonly statistics: ReadonlyMap<string, Statistic>;
  readonly type: MetricType;
  readonly category?: string;
  readonly analysisBases: readonly AnalysisBasis[];
}

export interface Segment {
  readonly slug: string;

  /** Slug of a segment data source */
  readonly dataSource: string;
  readonly selectExpression: string;
  readonly friendlyName?: string;
  readonly description?: string;
}

export interface Dimension {
  readonly slug: string;
  readonly dataSource: string;
  readonly selectExpression: string;
  readonly friendlyName?: string;
  readonly description?: string;
}

/** A template macro, e.g. agg_sum → `COALESCE(SUM({select_expr}), 0)` */
export interface TemplateFunction {
  readonly slug: string;
  readonly definition: string;
}

export type ParameterValue = ScalarParam | Readonly<Record<string, ScalarParam>>;

export interface Parameter {
  readonly slug: string;

  /** A scalar, or a branch → value mapping when distinctByBranch is set */
  readonly value: ParameterValue;
  readonly distinctByBranch: boolean;
  readonly friendlyName?: string;
  readonly description?: string;
}

/**
 * Experiment details set by configuration. They take precedence over the
 * context a caller passes when generating SQL.
 */
export interface ExperimentOverrides {
  readonly startDate?: string;
  readonly endDate?: string;
  readonly enrollmentPeriod?: number;
  readonly referenceBranch?: string;
}

/**
 * The output of merging: every entity keyed by slug, plus the names of the
 * layers that produced it (in merge order, for diagnostics).
 */
export interface ResolvedConfiguration {
  readonly dataSources: ReadonlyMap<string, DataSource>;
  readonly metrics: ReadonlyMap<string, Metric>;
  readonly segments: ReadonlyMap<string, Segment>;
  readonly segmentDataSources: ReadonlyMap<string, SegmentDataSource>;
  readonly dimensions: ReadonlyMap<string, Dimension>;

  /** Default parameters per statistic name */
  readonly statistics: ReadonlyMap<string, Statistic>;

  readonly functions: ReadonlyMap<string, TemplateFunction>;
  readonly parameters: ReadonlyMap<string, Parameter>;

  /** Metric slugs requested per analysis period */
  readonly analysisPeriods: ReadonlyMap<AnalysisPeriod, readonly string[]>;

  readonly experiment: ExperimentOverrides;

  readonly layers: readonly string[];
}

// ---
// DRAFTS
// ---

export interface JoinDraft {
  onExpression?: string;
  relationship?: Relationship;
}

export interface DataSourceDraft {
  fromExpression?: string;
  clientIdColumn?: string;
  submissionDateColumn?: string;
  experimentsColumnType?: ExperimentsColumnType;
  defaultDataset?: string;
  buildIdColumn?: string;
  friendlyName?: string;
  description?: string;
  windowStart?: number;
  windowEnd?: number;
  joins: Map<string, JoinDraft>;
}

export interface MetricDraft {
  dataSource?: string;
  selectExpression?: string;
  friendlyName?: string;
  description?: string;
  biggerIsBetter?: boolean;
  type?: MetricType;
  category?: string;
  analysisBases?: AnalysisBasis[];
  statistics: Map<string, Record<string, StatisticParam>>;
}

/** Shared by segments and dimensions */
export interface SelectionDraft {
  dataSource?: string;
  selectExpression?: string;
  friendlyName?: string;
  description?: string;
}

export interface FunctionDraft {
  definition?: string;
}

export interface ParameterDraft {
  value?: ParameterValue;
  distinctByBranch?: boolean;
  friendlyName?: string;
  description?: string;
}

export interface ExperimentDraft {
  startDate?: string;
  endDate?: string;
  enrollmentPeriod?: number;
  referenceBranch?: string;
}

/**
 * A configuration layer: a name for diagnostics plus the raw nested
 * mapping parsed from structured text.
 */
export interface Layer {
  readonly name: string;
  readonly definitions: Readonly<Record<string, unknown>>;
}

// ---
// HELPERS
// ---

/** Column names every aggregation block exposes */
export const KEY_COLUMNS = ['client_id', 'submission_date'] as const;

// `{dataset}` but not `{{dataset}}`, which is a template variable
const DATASET_PLACEHOLDER = /(?<!\{)\{dataset\}(?!\})/;

/**
 * Expand the `{dataset}` placeholder of a from expression.
 * Returns null when a placeholder is present but no dataset is known.
 */
export function fromExpressionFor(source: DataSource, dataset?: string): string | null {
  if (!DATASET_PLACEHOLDER.test(source.fromExpression)) {
    return source.fromExpression;
  }
  const effective = dataset ?? source.defaultDataset;
  if (effective === undefined) {
    return null;
  }
  return source.fromExpression.replace(new RegExp(DATASET_PLACEHOLDER.source, 'g'), effective);
}

/**
 * Statistic parameters for a metric, layered over the configured
 * statistic defaults.
 */
export function statisticsFor(metric: Metric, config: ResolvedConfiguration): Statistic[] {
  return [...metric.statistics.values()].map(statistic => {
    const defaults = config.statistics.get(statistic.name);
    if (!defaults) return statistic;
    return { name: statistic.name, params: { ...defaults.params, ...statistic.params } };
  });
}
