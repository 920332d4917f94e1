/**
 * Configuration errors.
 *
 * Problems found while merging, validating, resolving joins or assembling
 * queries are plain data, collected into lists so a caller can report every
 * problem in one pass. Only fatal problems (template rendering, loading)
 * are thrown, as Error subclasses.
 */

import type { Section, SourceSection } from './records.js';

/** Where a referencing entity lives */
export interface EntityRef {
  readonly section: Section;
  /** Empty for the `experiment` section, which has no slugs */
  readonly slug: string;
}

export interface UnknownDataSourceError {
  readonly kind: 'UnknownDataSource';
  readonly message: string;
  readonly dataSource: string;
  /** The metric, segment or dimension holding the reference (absent for a request root) */
  readonly referencedBy?: EntityRef;
}

export interface UnknownJoinTargetError {
  readonly kind: 'UnknownJoinTarget';
  readonly message: string;
  readonly section: SourceSection;
  readonly dataSource: string;
  readonly target: string;
}

export interface CyclicJoinGraphError {
  readonly kind: 'CyclicJoinGraph';
  readonly message: string;
  readonly section: SourceSection;
  /** Data sources on the cycle, in traversal order */
  readonly cycle: readonly string[];
}

export interface DuplicateMetricNameError {
  readonly kind: 'DuplicateMetricName';
  readonly message: string;
  /** The colliding column name as it appears in SQL (lower-cased) */
  readonly name: string;
  readonly slugs: readonly string[];
  readonly dataSource?: string;
}

export interface UnknownStatisticParameterError {
  readonly kind: 'UnknownStatisticParameter';
  readonly message: string;
  readonly metric: string;
  readonly statistic: string;
  readonly parameter: string;
}

export interface InvalidGroupByError {
  readonly kind: 'InvalidGroupBy';
  readonly message: string;
  /** The grouping dimension as requested */
  readonly dimension: string;
}

export interface MalformedOverrideError {
  readonly kind: 'MalformedOverride';
  readonly message: string;
  readonly layer: string;
  readonly entity: EntityRef;
  readonly field: string;
}

export interface UnexpectedFieldError {
  readonly kind: 'UnexpectedField';
  readonly message: string;
  readonly layer: string;
  readonly section: Section | '(root)';
  readonly slug?: string;
  readonly field: string;
}

export interface IncompleteDefinitionError {
  readonly kind: 'IncompleteDefinition';
  readonly message: string;
  readonly entity: EntityRef;
  readonly missing: readonly string[];
}

export interface UnknownMetricError {
  readonly kind: 'UnknownMetric';
  readonly message: string;
  readonly slug: string;
  readonly section: 'metrics' | 'segments';
}

export type ConfigError =
  | UnknownDataSourceError
  | UnknownJoinTargetError
  | CyclicJoinGraphError
  | DuplicateMetricNameError
  | UnknownStatisticParameterError
  | InvalidGroupByError
  | MalformedOverrideError
  | UnexpectedFieldError
  | IncompleteDefinitionError
  | UnknownMetricError;

export type ConfigErrorKind = ConfigError['kind'];

// ---
// CONSTRUCTORS
// ---

function describe(ref: EntityRef): string {
  return ref.slug ? `${ref.section}.${ref.slug}` : ref.section;
}

export function unknownDataSource(dataSource: string, referencedBy?: EntityRef): UnknownDataSourceError {
  const message = referencedBy
    ? `${describe(referencedBy)} references unknown data source '${dataSource}'`
    : `Unknown data source '${dataSource}'`;
  return { kind: 'UnknownDataSource', message, dataSource, referencedBy };
}

export function unknownJoinTarget(
  section: SourceSection,
  dataSource: string,
  target: string
): UnknownJoinTargetError {
  return {
    kind: 'UnknownJoinTarget',
    message: `${section}.${dataSource} joins unknown data source '${target}'`,
    section,
    dataSource,
    target,
  };
}

export function cyclicJoinGraph(section: SourceSection, cycle: readonly string[]): CyclicJoinGraphError {
  const path = [...cycle, cycle[0]].join(' -> ');
  return {
    kind: 'CyclicJoinGraph',
    message: `Join cycle in ${section}: ${path}`,
    section,
    cycle,
  };
}

export function duplicateMetricName(
  name: string,
  slugs: readonly string[],
  dataSource?: string
): DuplicateMetricNameError {
  const scope = dataSource ? ` in data source '${dataSource}'` : '';
  return {
    kind: 'DuplicateMetricName',
    message: `Column name '${name}' is used more than once${scope}: ${slugs.join(', ')}`,
    name,
    slugs,
    dataSource,
  };
}

export function unknownStatisticParameter(
  metric: string,
  statistic: string,
  parameter: string
): UnknownStatisticParameterError {
  return {
    kind: 'UnknownStatisticParameter',
    message: `metrics.${metric}.statistics.${statistic} sets unknown parameter '${parameter}'`,
    metric,
    statistic,
    parameter,
  };
}

export function invalidGroupBy(dimension: string, reason: string): InvalidGroupByError {
  return {
    kind: 'InvalidGroupBy',
    message: `Grouping dimension '${dimension}' ${reason}`,
    dimension,
  };
}

export function malformedOverride(
  layer: string,
  entity: EntityRef,
  field: string,
  reason: string
): MalformedOverrideError {
  return {
    kind: 'MalformedOverride',
    message: `Layer '${layer}': ${describe(entity)}.${field} ${reason}`,
    layer,
    entity,
    field,
  };
}

export function unexpectedField(
  layer: string,
  section: Section | '(root)',
  field: string,
  slug?: string
): UnexpectedFieldError {
  const owner = slug ? `${section}.${slug}` : section;
  return {
    kind: 'UnexpectedField',
    message: `Layer '${layer}': unexpected field '${field}' in ${owner}`,
    layer,
    section,
    slug,
    field,
  };
}

export function incompleteDefinition(entity: EntityRef, missing: readonly string[]): IncompleteDefinitionError {
  return {
    kind: 'IncompleteDefinition',
    message: `${describe(entity)} is missing required field(s): ${missing.join(', ')}`,
    entity,
    missing,
  };
}

export function unknownMetric(slug: string, section: 'metrics' | 'segments' = 'metrics'): UnknownMetricError {
  const noun = section === 'metrics' ? 'metric' : 'segment';
  return {
    kind: 'UnknownMetric',
    message: `Unknown ${noun} '${slug}'`,
    slug,
    section,
  };
}

// ---
// THROWN ERRORS
// ---

/**
 * Raised by the strict facade when merging or validation reported problems.
 */
export class ConfigurationError extends Error {
  readonly errors: readonly ConfigError[];

  constructor(errors: readonly ConfigError[]) {
    super(`Invalid configuration:\n${errors.map(e => `  - ${e.message}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}
