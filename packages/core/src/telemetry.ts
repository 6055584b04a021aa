/* eslint-disable no-console */

/**
 * Payloads of the events generation reports, keyed by event name.
 */
export interface ErrorEvents {
  readonly GenerationFailed: Readonly<{
    player: number;
    stage: 'generateEarly' | 'createLocations';
    message: string;
  }>;
}

export interface WarningEvents {
  /** The item pool holds pieces but no milestone hands any out. */
  readonly NoItemLocations: Readonly<{
    npieces: number;
    itempool: number;
  }>;
}

export interface ProgressEvents {
  readonly PieceOrderPlanned: Readonly<{
    pieces: number;
    precollected: number;
    itempool: number;
    pieceOrder: string;
    pieceTypeOrder: string;
  }>;
  readonly GenerationCompleted: Readonly<{
    player: number;
    npieces: number;
    itemLocations: number;
    fillerLocations: number;
    repairSwaps: number;
  }>;
}

/**
 * Counter increments since the previous report, keyed by group.
 */
export interface CounterGroups {
  readonly location_repair: Readonly<{ swaps: number }>;
  readonly merge_evaluator: Readonly<{ hits: number; misses: number }>;
}

export type ErrorEvent = keyof ErrorEvents;
export type WarningEvent = keyof WarningEvents;
export type ProgressEvent = keyof ProgressEvents;
export type CounterGroup = keyof CounterGroups;

export interface TelemetryFacade {
  recordError<E extends ErrorEvent>(event: E, data: ErrorEvents[E]): void;
  recordWarning<E extends WarningEvent>(event: E, data: WarningEvents[E]): void;
  recordProgress<E extends ProgressEvent>(event: E, data: ProgressEvents[E]): void;
  recordCounters<G extends CounterGroup>(group: G, counters: CounterGroups[G]): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[jigsaw:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[jigsaw:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[jigsaw:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[jigsaw:counters] ${group}`, counters);
  },
};

export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Console sink for local runs; the CLI installs it for `--verbose`.
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

/**
 * Forwards to whichever facade is installed. A throwing sink is logged and
 * never interrupts generation.
 */
export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(() => activeTelemetry.recordError(event, data));
  },
  recordWarning(event, data) {
    invokeSafely(() => activeTelemetry.recordWarning(event, data));
  },
  recordProgress(event, data) {
    invokeSafely(() => activeTelemetry.recordProgress(event, data));
  },
  recordCounters(group, counters) {
    invokeSafely(() => activeTelemetry.recordCounters(group, counters));
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely(report: () => void): void {
  try {
    report();
  } catch (error) {
    console.error('[jigsaw] telemetry invocation failed', error);
  }
}
