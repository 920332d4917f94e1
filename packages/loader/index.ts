export {
  LayerLoadError,
  parseLayer,
  loadLayerFile,
  layerStackPaths,
  loadLayerStack,
  type LayerSelection,
} from './toml-loader.js';
