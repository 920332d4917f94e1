/**
 * compiler package
 *
 * pipeline: ResolvedConfiguration → CompositionPlan (per data source) → QueryPlan → SQL
 */

// types
export type {
  CompositionPlan,
  CompositionBlock,
  CompositionEdge,
  QueryPlan,
  QueryKind,
  AggregationBlock,
  BlockColumn,
  BlockJoin,
  ExcludedEntity,
} from './query-plan.js';

// join graph resolver
export {
  resolveJoinGraph,
  synthesizeCondition,
  sourcesFor,
  printCompositionPlan,
  type JoinGraphOptions,
} from './join-graph.js';

// query assembler
export {
  assembleQuery,
  assembleSegmentQuery,
  printQueryPlan,
  type QueryOptions,
  type QueryRequest,
  type SegmentRequest,
  type AssembleResult,
} from './query-assembler.js';

// sql generator
export { generateSql } from './sql-generator.js';
