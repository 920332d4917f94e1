/**
 * TOML layer loader
 *
 * Reads configuration layers from TOML text or from a configuration
 * repository laid out as:
 *
 *   definitions/functions.toml      aggregation macros
 *   definitions/<platform>.toml     platform-wide definitions
 *   defaults/<platform>.toml        platform defaults
 *   definitions/<app>.toml          app-specific definitions
 *   <experiment>.toml               experiment overrides
 *
 * Layers are returned general first, which is the order the merger expects.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'smol-toml';
import type { Layer } from '../definitions/records.js';

export class LayerLoadError extends Error {
  readonly layer: string;

  constructor(layer: string, message: string) {
    super(`Failed to load layer '${layer}': ${message}`);
    this.name = 'LayerLoadError';
    this.layer = layer;
  }
}

export interface LayerSelection {
  platform: string;
  app?: string;
  experiment?: string;
}

/**
 * Parse TOML text into a layer.
 * @throws LayerLoadError on invalid TOML
 */
export function parseLayer(text: string, name: string): Layer {
  try {
    return { name, definitions: parse(text) };
  } catch (error) {
    throw new LayerLoadError(name, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Read and parse one layer file. The layer is named after the file unless
 * a name is given.
 */
export async function loadLayerFile(filePath: string, name?: string): Promise<Layer> {
  const layerName = name ?? path.basename(filePath, '.toml');
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LayerLoadError(layerName, error instanceof Error ? error.message : String(error));
  }
  return parseLayer(text, layerName);
}

/**
 * Candidate layer files for a selection, general first.
 */
export function layerStackPaths(root: string, selection: LayerSelection): string[] {
  const paths = [
    path.join(root, 'definitions', 'functions.toml'),
    path.join(root, 'definitions', `${selection.platform}.toml`),
    path.join(root, 'defaults', `${selection.platform}.toml`),
  ];
  if (selection.app && selection.app !== selection.platform) {
    paths.push(path.join(root, 'definitions', `${selection.app}.toml`));
  }
  if (selection.experiment) {
    paths.push(path.join(root, `${selection.experiment}.toml`));
  }
  return paths;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Load every existing layer of a selection, general first.
 * Layers are named by their path relative to `root`, without extension.
 */
export async function loadLayerStack(root: string, selection: LayerSelection): Promise<Layer[]> {
  const layers: Layer[] = [];
  for (const filePath of layerStackPaths(root, selection)) {
    if (!(await fileExists(filePath))) continue;
    const name = path.relative(root, filePath).split(path.sep).join('/').replace(/\.toml$/, '');
    layers.push(await loadLayerFile(filePath, name));
  }
  return layers;
}
