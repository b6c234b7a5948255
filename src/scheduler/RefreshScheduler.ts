/**
 * RefreshScheduler — runs library refreshes on startup, periodically and
 * on demand.
 *
 * Each library has one task with its own state machine:
 *
 *   idle → fetching → mapping → loading → idle
 *                 ↘        ↘         ↘
 *                          failed → (next run) → idle
 *
 * At most one refresh per library is in flight; a trigger that finds one
 * running returns `skippedBusy` instead of queueing. Libraries refresh
 * independently of each other. A run that exceeds the timeout is aborted
 * and reported failed; the store is only written while the run's signal is
 * live, so an aborted run never replaces a graph.
 */

import type { Logger } from '../logging/logger.js';
import type { PipelineStage, RefreshOutcome } from '../pipeline/LibraryPipeline.js';
import { RefreshAbortedError, errorMessage } from '../types/errors.js';

export type RefreshState = 'idle' | PipelineStage | 'failed';

export type RefreshPolicy =
  | { mode: 'disabled' }
  | { mode: 'startup' }
  | { mode: 'periodic'; intervalMs: number };

/** Shortest periodic interval, in seconds */
export const MIN_REFRESH_INTERVAL = 30;

/**
 * Interpret a refresh interval in seconds:
 * negative disables refreshing, 0 refreshes once at startup, 30 or more
 * refreshes periodically. 1 to 29 is rejected and treated as 0.
 */
export function resolveRefreshPolicy(seconds: number): { policy: RefreshPolicy; warning?: string } {
  if (seconds < 0) return { policy: { mode: 'disabled' } };
  if (seconds === 0) return { policy: { mode: 'startup' } };
  if (seconds < MIN_REFRESH_INTERVAL) {
    return {
      policy: { mode: 'startup' },
      warning: `refresh_interval ${seconds} is below ${MIN_REFRESH_INTERVAL} seconds; refreshing at startup only`,
    };
  }
  return { policy: { mode: 'periodic', intervalMs: seconds * 1000 } };
}

/**
 * Time source and timers, injectable for tests.
 */
export interface SchedulerClock {
  now(): number;
  /** Run once after `ms`; returns a cancel function */
  schedule(fn: () => void, ms: number): () => void;
  /** Run every `ms`; returns a cancel function */
  repeat(fn: () => void, ms: number): () => void;
}

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  schedule: (fn, ms) => {
    const timer = setTimeout(fn, ms);
    timer.unref();
    return () => clearTimeout(timer);
  },
  repeat: (fn, ms) => {
    const timer = setInterval(fn, ms);
    timer.unref();
    return () => clearInterval(timer);
  },
};

export interface RefreshRunContext {
  signal: AbortSignal;
  parseNotes?: boolean;
  onStage: (stage: PipelineStage) => void;
}

export type RefreshRunner = (context: RefreshRunContext) => Promise<RefreshOutcome>;

export interface TriggerOptions {
  parseNotes?: boolean;
}

export type RefreshResult =
  | { library: string; status: 'completed'; outcome: RefreshOutcome; durationMs: number }
  | { library: string; status: 'failed'; error: string; code?: string; durationMs: number }
  | { library: string; status: 'skipped'; skippedBusy: true };

export interface RefreshTaskStatus {
  library: string;
  state: RefreshState;
  inFlight: boolean;
  policy: RefreshPolicy;
  runs: number;
  errorStreak: number;
  lastError?: string;
  lastRunAt?: string;
  lastSuccessAt?: string;
  lastDurationMs?: number;
  lastOutcome?: RefreshOutcome;
}

/**
 * Settle with `work`, or reject with the signal's reason once it aborts.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

interface TaskOptions {
  clock: SchedulerClock;
  timeoutMs: number;
  logger: Logger;
}

class RefreshTask {
  private state: RefreshState = 'idle';
  private inFlight: Promise<RefreshResult> | null = null;
  /** The runner's own promise; outlives `inFlight` when a run times out */
  private runnerSettled: Promise<void> | null = null;
  private controller: AbortController | undefined;
  private cancelTimer: (() => void) | undefined;
  private runs = 0;
  private errorStreak = 0;
  private lastError: string | undefined;
  private lastRunAt: string | undefined;
  private lastSuccessAt: string | undefined;
  private lastDurationMs: number | undefined;
  private lastOutcome: RefreshOutcome | undefined;
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly runner: RefreshRunner,
    readonly policy: RefreshPolicy,
    private readonly options: TaskOptions,
  ) {
    this.logger = options.logger.child({ library: name });
  }

  async trigger(options: TriggerOptions = {}): Promise<RefreshResult> {
    if (this.busy()) {
      this.logger.debug({ state: this.state }, 'Refresh already in flight');
      return { library: this.name, status: 'skipped', skippedBusy: true };
    }
    const task = this.execute(options);
    this.inFlight = task;
    try {
      return await task;
    } finally {
      this.inFlight = null;
    }
  }

  private busy(): boolean {
    return this.inFlight !== null || this.runnerSettled !== null;
  }

  private track(work: Promise<RefreshOutcome>): void {
    const settled: Promise<void> = work.then(
      () => undefined,
      () => undefined,
    ).then(() => {
      if (this.runnerSettled !== settled) return;
      this.runnerSettled = null;
      if (!this.inFlight) this.logger.debug('Abandoned refresh settled');
    });
    this.runnerSettled = settled;
  }

  private transition(next: RefreshState): void {
    if (next === this.state) return;
    this.logger.debug({ from: this.state, to: next }, 'Refresh state');
    this.state = next;
  }

  private async execute(options: TriggerOptions): Promise<RefreshResult> {
    const { clock, timeoutMs } = this.options;
    const controller = new AbortController();
    this.controller = controller;
    const startedAt = clock.now();
    this.runs += 1;
    this.lastRunAt = new Date(startedAt).toISOString();
    this.transition('idle');

    const cancelTimeout = timeoutMs > 0
      ? clock.schedule(() => {
        controller.abort(new RefreshAbortedError(`Refresh of '${this.name}' exceeded ${timeoutMs} ms`, this.name, true));
      }, timeoutMs)
      : undefined;

    try {
      const work = this.runner({
        signal: controller.signal,
        ...(options.parseNotes !== undefined ? { parseNotes: options.parseNotes } : {}),
        onStage: (stage) => this.transition(stage),
      });
      this.track(work);
      const outcome = await raceAbort(work, controller.signal);
      const durationMs = clock.now() - startedAt;
      this.transition('idle');
      this.errorStreak = 0;
      this.lastError = undefined;
      this.lastSuccessAt = new Date(clock.now()).toISOString();
      this.lastDurationMs = durationMs;
      this.lastOutcome = outcome;
      return { library: this.name, status: 'completed', outcome, durationMs };
    } catch (err) {
      const durationMs = clock.now() - startedAt;
      this.transition('failed');
      this.errorStreak += 1;
      this.lastError = errorMessage(err);
      this.lastDurationMs = durationMs;
      this.logger.error({ err: this.lastError, errorStreak: this.errorStreak }, 'Refresh failed');
      const code = typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
      return {
        library: this.name,
        status: 'failed',
        error: this.lastError,
        ...(code ? { code } : {}),
        durationMs,
      };
    } finally {
      cancelTimeout?.();
      this.controller = undefined;
    }
  }

  start(delayMs: number): void {
    if (this.policy.mode === 'disabled' || this.cancelTimer) return;
    const run = (): void => {
      void this.trigger().catch((err: unknown) => {
        this.logger.error({ err: errorMessage(err) }, 'Scheduled refresh failed');
      });
    };
    const cancelInitial = this.options.clock.schedule(run, delayMs);
    const cancelRepeat = this.policy.mode === 'periodic'
      ? this.options.clock.repeat(run, this.policy.intervalMs)
      : undefined;
    this.cancelTimer = () => {
      cancelInitial();
      cancelRepeat?.();
    };
  }

  async stop(): Promise<void> {
    this.cancelTimer?.();
    this.cancelTimer = undefined;
    this.controller?.abort(new RefreshAbortedError(`Refresh of '${this.name}' cancelled`, this.name, false));
    if (this.inFlight) await this.inFlight;
  }

  status(): RefreshTaskStatus {
    return {
      library: this.name,
      state: this.state,
      inFlight: this.busy(),
      policy: this.policy,
      runs: this.runs,
      errorStreak: this.errorStreak,
      ...(this.lastError ? { lastError: this.lastError } : {}),
      ...(this.lastRunAt ? { lastRunAt: this.lastRunAt } : {}),
      ...(this.lastSuccessAt ? { lastSuccessAt: this.lastSuccessAt } : {}),
      ...(this.lastDurationMs !== undefined ? { lastDurationMs: this.lastDurationMs } : {}),
      ...(this.lastOutcome ? { lastOutcome: this.lastOutcome } : {}),
    };
  }
}

export interface RefreshSchedulerOptions {
  logger: Logger;
  clock?: SchedulerClock;
  /** Per-run deadline; 0 disables it */
  timeoutMs?: number;
  /** Wait before the initial run */
  startupDelayMs?: number;
}

export class RefreshScheduler {
  private readonly tasks = new Map<string, RefreshTask>();
  private readonly clock: SchedulerClock;
  private readonly timeoutMs: number;
  private readonly startupDelayMs: number;
  private readonly logger: Logger;
  private started = false;

  constructor(options: RefreshSchedulerOptions) {
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.startupDelayMs = options.startupDelayMs ?? 0;
    this.logger = options.logger.child({ component: 'scheduler' });
  }

  register(name: string, runner: RefreshRunner, policy: RefreshPolicy): void {
    if (this.tasks.has(name)) {
      throw new Error(`Library '${name}' is already registered`);
    }
    const task = new RefreshTask(name, runner, policy, {
      clock: this.clock,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
    this.tasks.set(name, task);
    if (this.started) task.start(0);
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  libraries(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * Arm the startup run and the periodic timers.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    for (const task of this.tasks.values()) {
      task.start(this.startupDelayMs);
    }
    this.logger.info({ libraries: this.tasks.size, delayMs: this.startupDelayMs }, 'Refresh scheduler started');
  }

  /**
   * Refresh one library now.
   *
   * @throws Error if the library is unknown
   */
  trigger(name: string, options: TriggerOptions = {}): Promise<RefreshResult> {
    const task = this.tasks.get(name);
    if (!task) {
      throw new Error(`Unknown library '${name}'`);
    }
    return task.trigger(options);
  }

  /**
   * Refresh every library now, concurrently.
   */
  triggerAll(options: TriggerOptions = {}): Promise<RefreshResult[]> {
    return Promise.all([...this.tasks.values()].map((task) => task.trigger(options)));
  }

  /**
   * Cancel timers and in-flight runs, then wait for them to settle.
   */
  async stop(): Promise<void> {
    this.started = false;
    await Promise.all([...this.tasks.values()].map((task) => task.stop()));
    this.logger.info('Refresh scheduler stopped');
  }

  status(): RefreshTaskStatus[] {
    return [...this.tasks.values()].map((task) => task.status());
  }

  statusOf(name: string): RefreshTaskStatus | undefined {
    return this.tasks.get(name)?.status();
  }
}
