/**
 * In-memory layers shared by the test suites.
 */

import type { Layer } from '../../packages/definitions/records.js';

export function layer(name: string, definitions: Record<string, unknown>): Layer {
  return { name, definitions };
}

/** clients_daily + events, two metrics on clients_daily and one on events */
export const generalLayer = layer('general', {
  data_sources: {
    clients_daily: {
      from_expression: 'tbl.clients_daily',
      friendly_name: 'Clients Daily',
    },
    events: {
      from_expression: 'tbl.events',
    },
  },
  metrics: {
    days_of_use: {
      data_source: 'clients_daily',
      select_expression: 'COUNT(submission_date)',
      friendly_name: 'Days of use',
      statistics: {
        bootstrap_mean: { num_samples: 1000 },
      },
    },
    active_hours: {
      data_source: 'clients_daily',
      select_expression: 'SUM(active_hours_sum)',
    },
    event_count: {
      data_source: 'events',
      select_expression: 'COUNT(*)',
    },
  },
});
