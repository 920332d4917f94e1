/**
 * Centralized defaults.
 *
 * Drafts accumulated by the Layer Merger are turned into records here, and
 * only here. A draft that lacks a required field yields an
 * IncompleteDefinition error instead of a record.
 */

import type {
  DataSource,
  DataSourceDraft,
  Dimension,
  FunctionDraft,
  Join,
  JoinDraft,
  Metric,
  MetricDraft,
  Parameter,
  ParameterDraft,
  Section,
  Segment,
  SegmentDataSource,
  SelectionDraft,
  Statistic,
  StatisticParam,
  TemplateFunction,
} from './records.js';
import { incompleteDefinition, type IncompleteDefinitionError } from './errors.js';

export const DEFAULTS = {
  clientIdColumn: 'client_id',
  submissionDateColumn: 'submission_date',
  experimentsColumnType: 'none',
  buildIdColumn: 'SAFE.SUBSTR(application.build_id, 0, 8)',
  relationship: 'many_to_many',
  biggerIsBetter: true,
  metricType: 'scalar',
  analysisBases: ['enrollments', 'exposures'],
  windowStart: 0,
  windowEnd: 0,
  distinctByBranch: false,
} as const;

export type Finalized<T> =
  | { readonly ok: true; readonly record: T }
  | { readonly ok: false; readonly error: IncompleteDefinitionError };

function incomplete(section: Section, slug: string, missing: string[]): Finalized<never> {
  return { ok: false, error: incompleteDefinition({ section, slug }, missing) };
}

export function finalizeJoin(target: string, draft: JoinDraft): Join {
  return {
    target,
    onExpression: draft.onExpression,
    relationship: draft.relationship ?? DEFAULTS.relationship,
  };
}

function finalizeJoins(drafts: ReadonlyMap<string, JoinDraft>): Map<string, Join> {
  const joins = new Map<string, Join>();
  for (const [target, draft] of drafts) {
    joins.set(target, finalizeJoin(target, draft));
  }
  return joins;
}

export function finalizeDataSource(slug: string, draft: DataSourceDraft): Finalized<DataSource> {
  if (draft.fromExpression === undefined) {
    return incomplete('data_sources', slug, ['from_expression']);
  }
  return {
    ok: true,
    record: {
      slug,
      fromExpression: draft.fromExpression,
      clientIdColumn: draft.clientIdColumn ?? DEFAULTS.clientIdColumn,
      submissionDateColumn: draft.submissionDateColumn ?? DEFAULTS.submissionDateColumn,
      experimentsColumnType: draft.experimentsColumnType ?? DEFAULTS.experimentsColumnType,
      defaultDataset: draft.defaultDataset,
      buildIdColumn: draft.buildIdColumn ?? DEFAULTS.buildIdColumn,
      friendlyName: draft.friendlyName,
      description: draft.description,
      joins: finalizeJoins(draft.joins),
    },
  };
}

export function finalizeSegmentDataSource(slug: string, draft: DataSourceDraft): Finalized<SegmentDataSource> {
  const base = finalizeDataSource(slug, draft);
  if (!base.ok) {
    return incomplete('segments.data_sources', slug, [...base.error.missing]);
  }
  return {
    ok: true,
    record: {
      ...base.record,
      windowStart: draft.windowStart ?? DEFAULTS.windowStart,
      windowEnd: draft.windowEnd ?? DEFAULTS.windowEnd,
    },
  };
}

function missingSelection(draft: SelectionDraft): string[] {
  const missing: string[] = [];
  if (draft.dataSource === undefined) missing.push('data_source');
  if (draft.selectExpression === undefined) missing.push('select_expression');
  return missing;
}

function finalizeStatistics(drafts: ReadonlyMap<string, Record<string, StatisticParam>>): Map<string, Statistic> {
  const statistics = new Map<string, Statistic>();
  for (const [name, params] of drafts) {
    statistics.set(name, { name, params: { ...params } });
  }
  return statistics;
}

export function finalizeMetric(slug: string, draft: MetricDraft): Finalized<Metric> {
  const { dataSource, selectExpression } = draft;
  if (dataSource === undefined || selectExpression === undefined) {
    return incomplete('metrics', slug, missingSelection(draft));
  }
  return {
    ok: true,
    record: {
      slug,
      dataSource,
      selectExpression,
      friendlyName: draft.friendlyName,
      description: draft.description,
      biggerIsBetter: draft.biggerIsBetter ?? DEFAULTS.biggerIsBetter,
      statistics: finalizeStatistics(draft.statistics),
      type: draft.type ?? DEFAULTS.metricType,
      category: draft.category,
      analysisBases: draft.analysisBases ?? [...DEFAULTS.analysisBases],
    },
  };
}

export function finalizeSegment(slug: string, draft: SelectionDraft): Finalized<Segment> {
  const { dataSource, selectExpression } = draft;
  if (dataSource === undefined || selectExpression === undefined) {
    return incomplete('segments', slug, missingSelection(draft));
  }
  return {
    ok: true,
    record: {
      slug,
      dataSource,
      selectExpression,
      friendlyName: draft.friendlyName,
      description: draft.description,
    },
  };
}

export function finalizeDimension(slug: string, draft: SelectionDraft): Finalized<Dimension> {
  const { dataSource, selectExpression } = draft;
  if (dataSource === undefined || selectExpression === undefined) {
    return incomplete('dimensions', slug, missingSelection(draft));
  }
  return {
    ok: true,
    record: {
      slug,
      dataSource,
      selectExpression,
      friendlyName: draft.friendlyName,
      description: draft.description,
    },
  };
}

export function finalizeFunction(slug: string, draft: FunctionDraft): Finalized<TemplateFunction> {
  if (draft.definition === undefined) {
    return incomplete('functions', slug, ['definition']);
  }
  return { ok: true, record: { slug, definition: draft.definition } };
}

export function finalizeParameter(slug: string, draft: ParameterDraft): Finalized<Parameter> {
  if (draft.value === undefined) {
    return incomplete('parameters', slug, ['value']);
  }
  return {
    ok: true,
    record: {
      slug,
      value: draft.value,
      distinctByBranch: draft.distinctByBranch ?? DEFAULTS.distinctByBranch,
      friendlyName: draft.friendlyName,
      description: draft.description,
    },
  };
}
