export * from './records.js';
export * from './errors.js';
export { DEFAULTS } from './defaults.js';
export { asTable, describeIssue, type Table } from './schema.js';
