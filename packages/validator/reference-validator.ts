/**
 * Reference Validator
 *
 * Checks the structural consistency of a resolved configuration:
 * data source references, join targets, join cycles, statistic parameters
 * and metric name collisions. Validation is pure; problems are returned, never thrown.
 */

import {
  KEY_COLUMNS,
  type DataSource,
  type ResolvedConfiguration,
  type SourceSection,
} from '../definitions/records.js';
import {
  type ConfigError,
  cyclicJoinGraph,
  duplicateMetricName,
  unknownDataSource,
  unknownJoinTarget,
  unknownStatisticParameter,
} from '../definitions/errors.js';
import { findCycles } from './join-cycles.js';

// ---
// INDIVIDUAL CHECKS
// ---

function checkDataSourceReferences(config: ResolvedConfiguration, errors: ConfigError[]): void {
  for (const metric of config.metrics.values()) {
    if (!config.dataSources.has(metric.dataSource)) {
      errors.push(unknownDataSource(metric.dataSource, { section: 'metrics', slug: metric.slug }));
    }
  }

  for (const dimension of config.dimensions.values()) {
    if (!config.dataSources.has(dimension.dataSource)) {
      errors.push(unknownDataSource(dimension.dataSource, { section: 'dimensions', slug: dimension.slug }));
    }
  }

  for (const segment of config.segments.values()) {
    if (!config.segmentDataSources.has(segment.dataSource)) {
      errors.push(unknownDataSource(segment.dataSource, { section: 'segments', slug: segment.slug }));
    }
  }
}

function checkJoins(
  section: SourceSection,
  sources: ReadonlyMap<string, DataSource>,
  errors: ConfigError[]
): void {
  for (const source of sources.values()) {
    for (const target of source.joins.keys()) {
      if (!sources.has(target)) {
        errors.push(unknownJoinTarget(section, source.slug, target));
      }
    }
  }

  for (const cycle of findCycles(sources)) {
    errors.push(cyclicJoinGraph(section, cycle));
  }
}

// always accepted, read by the pre-treatment step
const PRE_TREATMENTS = 'pre_treatments';

/**
 * A statistic with configured defaults only takes the parameters those
 * defaults declare. Statistics without defaults take any parameters.
 */
function checkStatisticParameters(config: ResolvedConfiguration, errors: ConfigError[]): void {
  for (const metric of config.metrics.values()) {
    for (const statistic of metric.statistics.values()) {
      const defaults = config.statistics.get(statistic.name);
      if (!defaults) continue;
      for (const parameter of Object.keys(statistic.params)) {
        if (parameter !== PRE_TREATMENTS && !(parameter in defaults.params)) {
          errors.push(unknownStatisticParameter(metric.slug, statistic.name, parameter));
        }
      }
    }
  }
}

/**
 * Metric names become SQL column names, which compare case-insensitively.
 * Collisions are checked per data source, since that is the unit one
 * aggregation block is built from.
 */
function checkMetricNames(config: ResolvedConfiguration, errors: ConfigError[]): void {
  const byDataSource = new Map<string, Map<string, string[]>>();

  for (const metric of config.metrics.values()) {
    let names = byDataSource.get(metric.dataSource);
    if (!names) {
      names = new Map();
      byDataSource.set(metric.dataSource, names);
    }
    const name = metric.slug.toLowerCase();
    names.set(name, [...(names.get(name) ?? []), metric.slug]);
  }

  const reserved: readonly string[] = KEY_COLUMNS;
  for (const [dataSource, names] of byDataSource) {
    for (const [name, slugs] of names) {
      if (slugs.length > 1 || reserved.includes(name)) {
        errors.push(duplicateMetricName(name, slugs, dataSource));
      }
    }
  }
}

// ---
// ENTRY POINT
// ---

/**
 * Validate a resolved configuration.
 *
 * Errors are ordered by check: data source references, data source joins,
 * segment data source joins, statistic parameters, metric names.
 */
export function validateConfiguration(config: ResolvedConfiguration): ConfigError[] {
  const errors: ConfigError[] = [];
  checkDataSourceReferences(config, errors);
  checkJoins('data_sources', config.dataSources, errors);
  checkJoins('segments.data_sources', config.segmentDataSources, errors);
  checkStatisticParameters(config, errors);
  checkMetricNames(config, errors);
  return errors;
}
