import { Registry } from 'prom-client';
import { describe, expect, it } from 'vitest';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';

async function readValues(registry: Registry, name: string) {
  const metric = registry.getSingleMetric(name);
  if (!metric) {
    throw new Error(`metric ${name} not registered`);
  }
  const snapshot = await metric.get();
  return snapshot.values;
}

function completed(player: number) {
  return { player, npieces: 25, itemLocations: 23, fillerLocations: 0, repairSwaps: 0 };
}

describe('createPrometheusTelemetry', () => {
  it('counts completed generations', async () => {
    const facade = createPrometheusTelemetry({ log: false });

    facade.recordProgress('GenerationCompleted', completed(1));
    facade.recordProgress('PieceOrderPlanned', {
      pieces: 25,
      precollected: 2,
      itempool: 23,
      pieceOrder: 'every_piece_fits',
      pieceTypeOrder: 'random_order',
    });
    facade.recordProgress('GenerationCompleted', completed(2));

    const values = await readValues(facade.registry, 'jigsaw_generations_total');
    expect(values[0]?.value).toBe(2);
  });

  it('labels errors by event', async () => {
    const facade = createPrometheusTelemetry({ log: false, prefix: 'test_' });

    facade.recordError('GenerationFailed', {
      player: 1,
      stage: 'generateEarly',
      message: 'Too many pieces per location.',
    });

    const values = await readValues(facade.registry, 'test_errors_total');
    expect(values).toEqual([
      expect.objectContaining({ value: 1, labels: { event: 'GenerationFailed' } }),
    ]);
  });

  it('labels warnings by event', async () => {
    const facade = createPrometheusTelemetry({ log: false });

    facade.recordWarning('NoItemLocations', { npieces: 25, itempool: 23 });
    facade.recordWarning('NoItemLocations', { npieces: 36, itempool: 30 });

    const values = await readValues(facade.registry, 'jigsaw_warnings_total');
    expect(values).toEqual([
      expect.objectContaining({ value: 2, labels: { event: 'NoItemLocations' } }),
    ]);
  });

  it('accumulates repair swaps and evaluator lookups', async () => {
    const registry = new Registry();
    const facade = createPrometheusTelemetry({ registry, log: false });

    facade.recordCounters('location_repair', { swaps: 3 });
    facade.recordCounters('location_repair', { swaps: 0 });
    facade.recordCounters('merge_evaluator', { hits: 4, misses: 1 });
    facade.recordCounters('merge_evaluator', { hits: 0, misses: 0 });

    const swaps = await readValues(registry, 'jigsaw_location_repair_swaps_total');
    expect(swaps[0]?.value).toBe(3);

    const lookups = await readValues(registry, 'jigsaw_merge_evaluator_lookups_total');
    const byOutcome = Object.fromEntries(
      lookups.map((entry) => [String(entry.labels.outcome), entry.value]),
    );
    expect(byOutcome).toEqual({ hit: 4, miss: 1 });
  });
});
