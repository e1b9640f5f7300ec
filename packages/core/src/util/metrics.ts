import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  COMPILE: 'compileMs',
  SELECT: 'selectMs',
  VALIDATE: 'validateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  compileMs: number;
  selectMs: number;
  validateMs: number;
  /** Operations in the compiled document */
  operations: number;
  /** Named components in the schema registry */
  schemas: number;
  /** Operations merged with a same-identity operation */
  mergedOperations: number;
  /** Encoded samples checked by the conformance validator */
  samplesValidated: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  compileMs: 0,
  selectMs: 0,
  validateMs: 0,
  operations: 0,
  schemas: 0,
  mergedOperations: 0,
  samplesValidated: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      compileMs: { total: 0 },
      selectMs: { total: 0 },
      validateMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    const duration = this.now() - current.startedAt;
    this.accumulateDuration(key, duration);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /** Runs `fn` between begin/end of `phase`, closing the timer on throw */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public setOperations(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.operations = count;
  }

  public setSchemas(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.schemas = count;
  }

  public addMergedOperation(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.mergedOperations += 1;
  }

  public addSamplesValidated(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.samplesValidated += count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
