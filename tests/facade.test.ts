/**
 * MetricCompiler Tests
 */

import { fileURLToPath } from 'url';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigurationError, MetricCompiler, createMetricCompiler } from '../packages/index.js';
import { generalLayer, layer } from './fixtures/layers.js';

const root = fileURLToPath(new URL('./fixtures/config-repo', import.meta.url));

const brokenLayer = layer('experiment', {
  metrics: { ghost_metric: { data_source: 'missing', select_expression: 'COUNT(*)' } },
});

describe('MetricCompiler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('merges and validates on construction', () => {
    const compiler = new MetricCompiler([generalLayer, brokenLayer]);

    expect(compiler.config.layers).toEqual(['general', 'experiment']);
    expect(compiler.errors.map(e => e.message)).toEqual([
      "metrics.ghost_metric references unknown data source 'missing'",
    ]);
  });

  it('compiles the valid part of a request', () => {
    const compiler = new MetricCompiler([generalLayer, brokenLayer]);
    const result = compiler.compile({ metrics: ['ghost_metric', 'event_count'] });

    expect(result.plan.blocks.map(b => b.name)).toEqual(['events']);
    expect(result.excluded.map(e => e.slug)).toEqual(['ghost_metric']);
    expect(result.sql?.replace(/\s+/g, ' ')).toBe(
      'SELECT client_id, submission_date, COUNT(*) AS event_count FROM tbl.events GROUP BY client_id, submission_date'
    );
  });

  it('returns no SQL when everything is excluded', () => {
    const compiler = new MetricCompiler([generalLayer]);
    const result = compiler.compile({ metrics: ['nope'] });

    expect(result.sql).toBeNull();
    expect(result.errors.map(e => e.kind)).toEqual(['UnknownMetric']);
  });

  it('compiles segments', () => {
    const compiler = new MetricCompiler([
      layer('general', {
        segments: {
          regular_users: { data_source: 'clients_last_seen', select_expression: 'LOGICAL_OR(is_regular)' },
          data_sources: { clients_last_seen: { from_expression: 'tbl.clients_last_seen' } },
        },
      }),
    ]);

    const result = compiler.compileSegments({ segments: ['regular_users'] });
    expect(result.plan.kind).toBe('segments');
    expect(result.sql).not.toBeNull();
  });

  describe('strict mode', () => {
    it('throws on configuration errors', () => {
      let caught: unknown;
      try {
        new MetricCompiler([generalLayer, brokenLayer], { strict: true });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({ errors: [{ kind: 'UnknownDataSource', dataSource: 'missing' }] });
      expect(caught instanceof Error ? caught.message : '').toBe(
        "Invalid configuration:\n  - metrics.ghost_metric references unknown data source 'missing'"
      );
    });

    it('throws when a request excludes anything', () => {
      const compiler = new MetricCompiler([generalLayer], { strict: true });

      expect(() => compiler.compile({ metrics: ['days_of_use', 'nope'] })).toThrow(ConfigurationError);
      expect(compiler.compile({ metrics: ['days_of_use'] }).sql).not.toBeNull();
    });
  });

  it('prints each stage in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const compiler = new MetricCompiler([generalLayer], { debug: true });
    const result = compiler.compile({ metrics: ['days_of_use'] });

    const printed = log.mock.calls.map(call => String(call[0]));
    expect(printed[0]).toMatch(/^ResolvedConfiguration:/);
    expect(printed).toContain(result.sql);
    expect(printed.some(text => text.startsWith('QueryPlan (metrics):'))).toBe(true);
    expect(printed.some(text => text.startsWith('CompositionPlan (data_sources.clients_daily):'))).toBe(true);
  });

  it('stays quiet without debug', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new MetricCompiler([generalLayer]).compile({ metrics: ['days_of_use'] });

    expect(log).not.toHaveBeenCalled();
  });
});

describe('createMetricCompiler', () => {
  it('compiles against a configuration repository', async () => {
    const compiler = await createMetricCompiler(root, { platform: 'desktop', experiment: 'onboarding-test' });
    const result = compiler.compile(
      { metrics: ['days_of_use', 'active_hours', 'event_count'] },
      { slug: 'onboarding-test', startDate: '2024-03-01', enrollmentPeriod: 7 }
    );

    expect(compiler.errors).toEqual([]);
    expect(result.excluded.map(e => `${e.slug}:${e.kind}`)).toEqual(['event_count:UnknownMetric']);
    expect(result.sql).toBe(
      [
        'SELECT',
        '  COALESCE(clients_daily.client_id, events.legacy_client_id) AS client_id,',
        '  COALESCE(clients_daily.submission_date, events.submission_date) AS submission_date,',
        '  COUNT(clients_daily.submission_date) AS days_of_use,',
        '  MAX(active_hours_sum) AS active_hours',
        'FROM',
        '  mozdata.telemetry.clients_daily AS clients_daily',
        '  FULL OUTER JOIN mozdata.telemetry.events_v1 AS events ON clients_daily.client_id = events.legacy_client_id AND clients_daily.submission_date = events.submission_date',
        'GROUP BY',
        '  client_id, submission_date',
      ].join('\n')
    );
  });
});
