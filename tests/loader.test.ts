/**
 * TOML Loader Tests
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import {
  LayerLoadError,
  layerStackPaths,
  loadLayerFile,
  loadLayerStack,
  parseLayer,
} from '../packages/loader/index.js';
import { mergeLayers } from '../packages/merger/index.js';
import { validateConfiguration } from '../packages/validator/index.js';

const root = fileURLToPath(new URL('./fixtures/config-repo', import.meta.url));

describe('TOML Loader', () => {
  describe('parseLayer', () => {
    it('parses TOML into a layer', () => {
      const parsed = parseLayer(
        ['[metrics.days_of_use]', 'data_source = "clients_daily"', 'select_expression = "COUNT(*)"'].join('\n'),
        'inline'
      );

      expect(parsed).toEqual({
        name: 'inline',
        definitions: {
          metrics: { days_of_use: { data_source: 'clients_daily', select_expression: 'COUNT(*)' } },
        },
      });
    });

    it('reports invalid TOML with the layer name', () => {
      let caught: unknown;
      try {
        parseLayer('metrics = [', 'broken');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(LayerLoadError);
      expect(caught).toMatchObject({ name: 'LayerLoadError', layer: 'broken' });
      expect(caught instanceof Error ? caught.message : '').toMatch(/^Failed to load layer 'broken': /);
    });
  });

  describe('loadLayerFile', () => {
    it('names the layer after the file', async () => {
      const loaded = await loadLayerFile(path.join(root, 'definitions', 'functions.toml'));

      expect(loaded).toEqual({
        name: 'functions',
        definitions: { functions: { agg_max: { definition: 'MAX({select_expr})' } } },
      });
    });

    it('rejects a missing file', async () => {
      await expect(loadLayerFile(path.join(root, 'definitions', 'fenix.toml'))).rejects.toBeInstanceOf(LayerLoadError);
    });
  });

  describe('layerStackPaths', () => {
    it('orders candidates general first', () => {
      expect(layerStackPaths('/config', { platform: 'desktop', app: 'firefox_desktop', experiment: 'onboarding-test' })).toEqual([
        path.join('/config', 'definitions', 'functions.toml'),
        path.join('/config', 'definitions', 'desktop.toml'),
        path.join('/config', 'defaults', 'desktop.toml'),
        path.join('/config', 'definitions', 'firefox_desktop.toml'),
        path.join('/config', 'onboarding-test.toml'),
      ]);
    });

    it('skips the app layer when the app is the platform', () => {
      expect(layerStackPaths('/config', { platform: 'desktop', app: 'desktop' })).toEqual([
        path.join('/config', 'definitions', 'functions.toml'),
        path.join('/config', 'definitions', 'desktop.toml'),
        path.join('/config', 'defaults', 'desktop.toml'),
      ]);
    });
  });

  describe('loadLayerStack', () => {
    it('loads the layers that exist, named by relative path', async () => {
      const layers = await loadLayerStack(root, { platform: 'desktop', app: 'fenix', experiment: 'onboarding-test' });

      expect(layers.map(l => l.name)).toEqual([
        'definitions/functions',
        'definitions/desktop',
        'defaults/desktop',
        'onboarding-test',
      ]);
    });

    it('loads only the shared layer for an unknown platform', async () => {
      expect(await loadLayerStack(root, { platform: 'ios' })).toEqual([
        expect.objectContaining({ name: 'definitions/functions' }),
      ]);
    });

    it('merges a loaded stack into a valid configuration', async () => {
      const layers = await loadLayerStack(root, { platform: 'desktop', experiment: 'onboarding-test' });
      const { config, errors } = mergeLayers(layers);

      expect(errors).toEqual([]);
      expect(validateConfiguration(config)).toEqual([]);

      expect([...config.metrics.keys()]).toEqual(['days_of_use', 'active_hours']);
      expect(config.metrics.get('active_hours')?.selectExpression).toBe('{{agg_max("active_hours_sum")}}');
      expect(config.metrics.get('days_of_use')?.description).toBe(
        'Number of days with any activity\nduring the analysis window.'
      );
      expect(config.dataSources.get('clients_daily')?.experimentsColumnType).toBe('simple');
      expect(config.dataSources.get('clients_daily')?.joins.get('events')?.relationship).toBe('one_to_many');
      expect(config.statistics.get('bootstrap_mean')?.params).toEqual({
        num_samples: 500,
        pre_treatments: ['remove_nulls'],
      });
      expect(config.analysisPeriods.get('weekly')).toEqual(['days_of_use', 'active_hours']);
      expect(config.parameters.get('min_days')?.value).toBe(3);
      expect(config.experiment).toEqual({ enrollmentPeriod: 7 });
    });
  });
});
