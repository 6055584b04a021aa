/* eslint-disable no-console */

import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

import type { CounterGroup, CounterGroups, TelemetryFacade } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  readonly log?: boolean;
}

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

const DEFAULT_PREFIX = 'jigsaw_';

type CounterHandlers = { readonly [G in CounterGroup]: (counters: CounterGroups[G]) => void };

/**
 * Telemetry facade backed by prom-client. Every counter group maps onto a
 * Prometheus counter; completed generations are counted from progress events.
 */
export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const log = options.log ?? true;

  if (options.collectDefaultMetrics ?? false) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}errors_total`,
    help: 'Total number of errors reported during generation or evaluation.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}warnings_total`,
    help: 'Total number of warnings reported during generation or evaluation.',
    registers: [registry],
    labelNames: ['event'],
  });

  const generations = new Counter({
    name: `${prefix}generations_total`,
    help: 'Total number of completed world generations.',
    registers: [registry],
  });

  const repairSwaps = new Counter({
    name: `${prefix}location_repair_swaps_total`,
    help: 'Total number of item/filler swaps made while repairing milestones.',
    registers: [registry],
  });

  const evaluatorLookups = new Counter({
    name: `${prefix}merge_evaluator_lookups_total`,
    help: 'Cached merge evaluator lookups, split by cache outcome.',
    registers: [registry],
    labelNames: ['outcome'],
  });

  const counterHandlers: CounterHandlers = {
    location_repair({ swaps }) {
      incrementPositive(repairSwaps, swaps);
    },
    merge_evaluator({ hits, misses }) {
      if (hits > 0) {
        evaluatorLookups.inc({ outcome: 'hit' }, hits);
      }
      if (misses > 0) {
        evaluatorLookups.inc({ outcome: 'miss' }, misses);
      }
    },
  };

  const facade: PrometheusTelemetryFacade = {
    recordError(event, data) {
      errors.inc({ event });
      if (log) {
        console.error(`[jigsaw:error] ${event}`, data);
      }
    },
    recordWarning(event, data) {
      warnings.inc({ event });
      if (log) {
        console.warn(`[jigsaw:warning] ${event}`, data);
      }
    },
    recordProgress(event, data) {
      if (event === 'GenerationCompleted') {
        generations.inc();
      }
      if (log) {
        console.info(`[jigsaw:progress] ${event}`, data);
      }
    },
    recordCounters(group, counters) {
      counterHandlers[group](counters);
    },
    registry,
  };

  return facade;
}

function incrementPositive(counter: Counter<string>, value: number): void {
  if (value > 0) {
    counter.inc(value);
  }
}
