/**
 * Join Graph Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { mergeLayers } from '../packages/merger/index.js';
import { printCompositionPlan, resolveJoinGraph } from '../packages/compiler/index.js';
import { layer } from './fixtures/layers.js';

function configOf(definitions: Record<string, unknown>) {
  return mergeLayers([layer('general', definitions)]).config;
}

describe('Join Graph Resolver', () => {
  describe('synthesized conditions', () => {
    it('joins on client id and submission date', () => {
      const config = configOf({
        data_sources: {
          baseline: { from_expression: 'tbl.baseline', joins: { events: { relationship: 'many_to_many' } } },
          events: { from_expression: 'tbl.events' },
        },
      });

      const plan = resolveJoinGraph('baseline', config);

      expect(plan.errors).toEqual([]);
      expect(plan.warnings).toEqual([]);
      expect(plan.edges).toEqual([
        {
          left: 'baseline',
          right: 'events',
          onExpression: 'baseline.client_id = events.client_id AND baseline.submission_date = events.submission_date',
          relationship: 'many_to_many',
          synthesized: true,
        },
      ]);
      expect(plan.blocks.map(b => [b.dataSource, b.depth])).toEqual([
        ['baseline', 0],
        ['events', 1],
      ]);
    });

    it("uses each side's own key columns", () => {
      const config = configOf({
        data_sources: {
          baseline: { from_expression: 'tbl.baseline', joins: { events: {} } },
          events: { from_expression: 'tbl.events', client_id_column: 'legacy_client_id', submission_date_column: 'event_date' },
        },
      });

      const [edge] = resolveJoinGraph('baseline', config).edges;
      expect(edge.onExpression).toBe(
        'baseline.client_id = events.legacy_client_id AND baseline.submission_date = events.event_date'
      );
    });

    it('adds dimension columns declared on both sides', () => {
      const config = configOf({
        data_sources: {
          baseline: { from_expression: 'tbl.baseline', joins: { events: {} } },
          events: { from_expression: 'tbl.events' },
        },
        dimensions: {
          country: { data_source: 'baseline', select_expression: 'country' },
          os_family: { data_source: 'baseline', select_expression: 'LOWER(os)' },
          channel: { data_source: 'baseline', select_expression: 'channel' },
          event_country: { data_source: 'events', select_expression: 'country' },
          event_client: { data_source: 'events', select_expression: 'client_id' },
        },
      });

      const plan = resolveJoinGraph('baseline', config);

      expect(plan.blocks[0].dimensions).toEqual(['country', 'channel']);
      expect(plan.blocks[1].dimensions).toEqual(['country']);
      expect(plan.edges[0].onExpression).toBe(
        'baseline.client_id = events.client_id AND baseline.submission_date = events.submission_date AND baseline.country = events.country'
      );
    });
  });

  it('uses an explicit on_expression verbatim', () => {
    const config = configOf({
      data_sources: {
        baseline: {
          from_expression: 'tbl.baseline',
          joins: { events: { on_expression: 'baseline.client_id = events.cid', relationship: 'one_to_many' } },
        },
        events: { from_expression: 'tbl.events' },
      },
    });

    expect(resolveJoinGraph('baseline', config).edges).toEqual([
      {
        left: 'baseline',
        right: 'events',
        onExpression: 'baseline.client_id = events.cid',
        relationship: 'one_to_many',
        synthesized: false,
      },
    ]);
  });

  it('follows joins transitively, breadth first', () => {
    const config = configOf({
      data_sources: {
        a: { from_expression: 'tbl.a', joins: { b: {}, c: {} } },
        b: { from_expression: 'tbl.b', joins: { d: {} } },
        c: { from_expression: 'tbl.c' },
        d: { from_expression: 'tbl.d' },
      },
    });

    const plan = resolveJoinGraph('a', config, { metrics: ['m1'] });

    expect(plan.blocks.map(b => `${b.dataSource}@${b.depth}`)).toEqual(['a@0', 'b@1', 'c@1', 'd@2']);
    expect(plan.edges.map(e => `${e.left}->${e.right}`)).toEqual(['a->b', 'a->c', 'b->d']);
    expect(plan.blocks[0].metrics).toEqual(['m1']);
    expect(plan.blocks[3].metrics).toEqual([]);
  });

  describe('revisits', () => {
    it('terminates on a cycle and drops the closing edge', () => {
      const config = configOf({
        data_sources: {
          x: { from_expression: 'tbl.x', joins: { y: {} } },
          y: { from_expression: 'tbl.y', joins: { x: {} } },
        },
      });

      const plan = resolveJoinGraph('x', config);

      expect(plan.blocks.map(b => b.dataSource)).toEqual(['x', 'y']);
      expect(plan.edges.map(e => `${e.left}->${e.right}`)).toEqual(['x->y']);
      expect(plan.warnings).toEqual(["Dropped join y -> x: 'x' is already part of the composition for 'x'"]);
      expect(plan.errors).toEqual([]);
    });

    it('joins a shared target only once', () => {
      const config = configOf({
        data_sources: {
          a: { from_expression: 'tbl.a', joins: { b: {}, c: {} } },
          b: { from_expression: 'tbl.b', joins: { c: {} } },
          c: { from_expression: 'tbl.c' },
        },
      });

      const plan = resolveJoinGraph('a', config);

      expect(plan.blocks.map(b => b.dataSource)).toEqual(['a', 'b', 'c']);
      expect(plan.warnings).toEqual(["Dropped join b -> c: 'c' is already part of the composition for 'a'"]);
    });

    it('terminates on a self-join', () => {
      const config = configOf({
        data_sources: { events: { from_expression: 'tbl.events', joins: { events: {} } } },
      });

      const plan = resolveJoinGraph('events', config);
      expect(plan.blocks).toHaveLength(1);
      expect(plan.edges).toEqual([]);
      expect(plan.warnings).toHaveLength(1);
    });
  });

  describe('unknown data sources', () => {
    it('drops an unknown join target', () => {
      const config = configOf({
        data_sources: { a: { from_expression: 'tbl.a', joins: { ghost: {} } } },
      });

      const plan = resolveJoinGraph('a', config);

      expect(plan.blocks.map(b => b.dataSource)).toEqual(['a']);
      expect(plan.edges).toEqual([]);
      expect(plan.errors.map(e => e.message)).toEqual(["data_sources.a joins unknown data source 'ghost'"]);
    });

    it('reports an unknown root', () => {
      const plan = resolveJoinGraph('nope', configOf({}));

      expect(plan.blocks).toEqual([]);
      expect(plan.errors.map(e => e.message)).toEqual(["Unknown data source 'nope'"]);
    });
  });

  it('resolves segment data sources when asked', () => {
    const config = configOf({
      data_sources: { clients_last_seen: { from_expression: 'tbl.wrong' } },
      segments: {
        data_sources: {
          clients_last_seen: { from_expression: 'tbl.clients_last_seen', joins: { profiles: {} } },
          profiles: { from_expression: 'tbl.profiles' },
        },
      },
    });

    const plan = resolveJoinGraph('clients_last_seen', config, { section: 'segments.data_sources' });

    expect(plan.section).toBe('segments.data_sources');
    expect(plan.blocks.map(b => b.dataSource)).toEqual(['clients_last_seen', 'profiles']);
  });

  it('prints a composition plan', () => {
    const config = configOf({
      data_sources: {
        baseline: { from_expression: 'tbl.baseline', joins: { events: { on_expression: 'baseline.id = events.id' } } },
        events: { from_expression: 'tbl.events' },
      },
    });

    const printed = printCompositionPlan(resolveJoinGraph('baseline', config, { metrics: ['days_of_use'] }));

    expect(printed).toBe(
      [
        'CompositionPlan (data_sources.baseline):',
        '  baseline [client_id, submission_date] metrics: days_of_use',
        '    events [client_id, submission_date]',
        '  Edges:',
        '    baseline -> events (many_to_many, explicit): baseline.id = events.id',
      ].join('\n')
    );
  });
});
