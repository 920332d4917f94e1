export { mergeLayers, printConfiguration, type MergeResult } from './layer-merger.js';
export { normalizeLayer, dedent, type LayerOverrides, type Update } from './normalize.js';
