/**
 * Template variables describing the analysed experiment and the configured
 * parameters.
 */

import type { ExperimentOverrides, Parameter, ParameterValue } from '../definitions/records.js';
import { TemplateError } from './template-error.js';
import type { TemplateScope } from './renderer.js';

export interface ExperimentContext {
  slug?: string;

  /** YYYY-MM-DD */
  startDate?: string;

  /** Enrollment length in days */
  enrollmentPeriod?: number;

  /** YYYY-MM-DD */
  endDate?: string;

  referenceBranch?: string;
  appName?: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function parseDate(value: string, field: string): Date {
  const date = new Date(`${value}T00:00:00Z`);
  // Date rolls impossible days (2024-02-30) over into the next month
  if (!ISO_DATE.test(value) || Number.isNaN(date.getTime()) || formatDate(date) !== value) {
    throw new TemplateError('InvalidTemplateValue', `experiment.${field} must be a YYYY-MM-DD date, got '${value}'`);
  }
  return date;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Start date plus the enrollment period, in UTC days */
export function lastEnrollmentDate(startDate: string, enrollmentPeriod: number): string {
  const date = parseDate(startDate, 'start_date');
  date.setUTCDate(date.getUTCDate() + enrollmentPeriod);
  return formatDate(date);
}

/**
 * Variables under `experiment.*`. A variable whose source value is absent
 * is left undefined, so templates using it fail to render.
 */
export function experimentScope(context: ExperimentContext): TemplateScope {
  const scope: Record<string, string | number> = {};
  if (context.slug !== undefined) scope.slug = context.slug;

  if (context.startDate !== undefined) {
    scope.start_date_str = formatDate(parseDate(context.startDate, 'start_date'));
    if (context.enrollmentPeriod !== undefined) {
      scope.last_enrollment_date_str = lastEnrollmentDate(context.startDate, context.enrollmentPeriod);
    }
  }
  if (context.endDate !== undefined) {
    scope.end_date_str = formatDate(parseDate(context.endDate, 'end_date'));
  }
  if (context.enrollmentPeriod !== undefined) scope.enrollment_period = context.enrollmentPeriod;
  if (context.referenceBranch !== undefined) scope.reference_branch = context.referenceBranch;
  if (context.appName !== undefined) scope.app_name = context.appName;

  return scope;
}

/**
 * Layer configured experiment details over the caller's context, field by
 * field. Undefined when neither says anything.
 */
export function resolveExperiment(
  overrides: ExperimentOverrides,
  context?: ExperimentContext
): ExperimentContext | undefined {
  const configured =
    overrides.startDate !== undefined ||
    overrides.endDate !== undefined ||
    overrides.enrollmentPeriod !== undefined ||
    overrides.referenceBranch !== undefined;
  if (!context && !configured) return undefined;

  return {
    ...context,
    startDate: overrides.startDate ?? context?.startDate,
    endDate: overrides.endDate ?? context?.endDate,
    enrollmentPeriod: overrides.enrollmentPeriod ?? context?.enrollmentPeriod,
    referenceBranch: overrides.referenceBranch ?? context?.referenceBranch,
  };
}

// ---
// PARAMETERS
// ---

/** A per-branch mapping becomes a CASE over the enrollment branch column */
export function renderParameterValue(value: ParameterValue): string {
  if (typeof value !== 'object') {
    return String(value);
  }
  const arms = Object.entries(value).map(([branch, branchValue]) => `WHEN "${branch}" THEN "${String(branchValue)}"`);
  return `CASE e.branch ${arms.join(' ')} END`;
}

export function parameterScope(parameters: ReadonlyMap<string, Parameter>): TemplateScope {
  // fromEntries defines own properties, so a slug like `__proto__` survives
  return Object.fromEntries(
    [...parameters.values()].map(parameter => [parameter.slug, renderParameterValue(parameter.value)])
  );
}

/** The full scope for rendering SQL fragments */
export function queryScope(
  parameters: ReadonlyMap<string, Parameter>,
  experiment?: ExperimentContext
): TemplateScope {
  const scope: Record<string, TemplateScope> = { parameters: parameterScope(parameters) };
  if (experiment) {
    scope.experiment = experimentScope(experiment);
  }
  return scope;
}
