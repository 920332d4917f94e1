export { validateConfiguration } from './reference-validator.js';
export { findCycles, joinEdges } from './join-cycles.js';
