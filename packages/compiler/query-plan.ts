/**
 * Query plan structures
 *
 * The intermediate representation between configuration and SQL text:
 *
 * - CompositionPlan: one data source with its (transitive) joins expanded
 * - QueryPlan: aggregation blocks, one per data source holding requested
 *   metrics, and the outer joins that combine them
 *
 * Plans hold SQL fragments exactly as configured. Template substitution and
 * dataset expansion happen only when SQL is generated.
 */

import type { Relationship, SourceSection } from '../definitions/records.js';
import type { ConfigError, ConfigErrorKind } from '../definitions/errors.js';

// ---
// COMPOSITION (JOIN GRAPH)
// ---

export interface CompositionBlock {
  /** Data source slug; also its alias inside the composed FROM */
  readonly dataSource: string;

  /** Distance from the root in join edges */
  readonly depth: number;

  readonly clientIdColumn: string;
  readonly submissionDateColumn: string;

  /** Columns named by Dimension records declared on this data source */
  readonly dimensions: readonly string[];

  /** Metric slugs computed from this block (root only) */
  readonly metrics: readonly string[];
}

export interface CompositionEdge {
  readonly left: string;
  readonly right: string;
  readonly onExpression: string;
  readonly relationship: Relationship;

  /** True when the condition was derived from key and dimension columns */
  readonly synthesized: boolean;
}

export interface CompositionPlan {
  readonly root: string;
  readonly section: SourceSection;

  /** Breadth-first order; the root comes first */
  readonly blocks: readonly CompositionBlock[];

  /** Join edges in the order they are applied */
  readonly edges: readonly CompositionEdge[];

  readonly errors: readonly ConfigError[];

  /** Edges dropped because their target was already placed */
  readonly warnings: readonly string[];
}

// ---
// QUERY
// ---

export interface BlockColumn {
  /** SQL expression, possibly templated */
  readonly expression: string;
  readonly alias: string;
}

export interface AggregationBlock {
  /** Name of the block in the combined statement (the data source slug) */
  readonly name: string;
  readonly composition: CompositionPlan;

  /** client_id and submission_date */
  readonly keys: readonly BlockColumn[];
  readonly dimensions: readonly BlockColumn[];
  readonly metrics: readonly BlockColumn[];
}

/** Outer join of a block onto the anchor block */
export interface BlockJoin {
  readonly anchor: string;
  readonly block: string;

  /** Column names compared for equality on both sides */
  readonly columns: readonly string[];
}

export type QueryKind = 'metrics' | 'segments';

export interface QueryPlan {
  readonly kind: QueryKind;

  /** The first block is the anchor */
  readonly blocks: readonly AggregationBlock[];
  readonly joins: readonly BlockJoin[];

  /** Grouping dimensions in request order */
  readonly groupBy: readonly BlockColumn[];

  readonly where?: string;

  /** Substituted for `{dataset}` in from expressions */
  readonly dataset?: string;
}

/** A requested metric or segment left out of the plan */
export interface ExcludedEntity {
  readonly section: QueryKind;
  readonly slug: string;
  readonly kind: ConfigErrorKind;
  readonly reason: string;
}
