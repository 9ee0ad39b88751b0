/**
 * Trigger Supervisor
 *
 * Outer loop of the daemon:
 *
 *   connecting → syncing (initial refresh) → running → disconnected → (retry delay) → connecting ...
 *
 * While running, two tasks share the connection:
 * 1. LISTENER - on "Mesh Bed Leveling Complete", wait for the mesh to
 *    settle, then refresh
 * 2. TIMER    - sleep the sync interval, then refresh, forever
 *
 * The first task to fail ends the connection epoch; the other is cut off by
 * closing the connection. stop() is the only way out of the loop.
 */

import type { EventBus } from '../events/bus.js';
import type { SupervisorState, SupervisorTask } from '../events/types.js';
import { isMeshCompleteLine } from '../extractors/index.js';
import { BedlogError, toError } from '../infra/errors.js';
import { isAbortError, sleep } from '../infra/sleep.js';
import { RpcChannel } from '../rpc/channel.js';
import { ResponseRouter, type NotificationSubscription } from '../rpc/router.js';
import type { RecordStores } from '../store/stores.js';
import { SyncEngine } from '../sync/engine.js';
import type { TransportFactory } from '../transport/types.js';

export const GCODE_RESPONSE_NOTIFICATION = 'notify_gcode_response';

export interface SupervisorConfig {
  /** Time between periodic refreshes (default: 6 hours) */
  intervalMs: number;
  /** Wait before reconnecting after a failure (default: 30 s) */
  retryDelayMs: number;
  /** Wait after the mesh trigger before refreshing (default: 30 s) */
  settleDelayMs: number;
}

export interface SupervisorDeps {
  createTransport: TransportFactory;
  stores: RecordStores;
  events: EventBus;
  /** Clock in seconds used to stamp mesh snapshots */
  now?: () => number;
}

export const DEFAULT_SUPERVISOR_CONFIG: SupervisorConfig = {
  intervalMs: 6 * 60 * 60 * 1000,
  retryDelayMs: 30 * 1000,
  settleDelayMs: 30 * 1000,
};

export class TriggerSupervisor {
  private config: SupervisorConfig;
  private deps: SupervisorDeps;
  private state: SupervisorState = 'idle';
  private shutdown = new AbortController();
  private router: ResponseRouter | null = null;
  private loop: Promise<void> | null = null;
  private failures = 0;

  constructor(deps: SupervisorDeps, config: Partial<SupervisorConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_SUPERVISOR_CONFIG, ...config };
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  /**
   * Consecutive failed epochs since the last successful initial sync
   */
  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Run until stop() is called
   */
  run(): Promise<void> {
    if (this.loop) {
      throw new BedlogError('Supervisor is already running');
    }
    this.loop = this.superviseLoop();
    return this.loop;
  }

  /**
   * Abort every wait, close the connection and wait for run() to return
   */
  async stop(): Promise<void> {
    if (!this.shutdown.signal.aborted) {
      this.shutdown.abort();
      await this.router?.close();
    }
    await this.loop;
  }

  private async superviseLoop(): Promise<void> {
    const { events } = this.deps;
    const signal = this.shutdown.signal;

    while (!signal.aborted) {
      try {
        await this.runEpoch();
      } catch (error) {
        if (signal.aborted) break;

        this.failures++;
        events.emit({ type: 'supervisor:error', state: this.state, error: toError(error) });
        this.transition('disconnected');
        events.emit({ type: 'supervisor:retry', delayMs: this.config.retryDelayMs, attempt: this.failures });

        try {
          await sleep(this.config.retryDelayMs, signal);
        } catch (sleepError) {
          if (isAbortError(sleepError)) break;
          throw sleepError;
        }
      }
    }

    this.transition('stopped');
  }

  /**
   * One connection, from connect to failure. Only returns by throwing.
   */
  private async runEpoch(): Promise<void> {
    const { createTransport, stores, events, now } = this.deps;

    this.transition('connecting');
    const channel = new RpcChannel(createTransport());
    const router = new ResponseRouter(channel, events);
    this.router = router;

    const tasks: Promise<void>[] = [];
    const epoch = new AbortController();
    const abortEpoch = () => epoch.abort();
    this.shutdown.signal.addEventListener('abort', abortEpoch, { once: true });

    let opened = false;

    try {
      await channel.open();
      opened = true;
      events.emit({ type: 'connection:open', endpoint: channel.endpoint });
      router.start();

      // Subscribe before the initial sync so no trigger is missed meanwhile
      const subscription = router.subscribe();
      const engine = new SyncEngine(router, stores, { events, now });

      this.transition('syncing');
      await engine.refresh('initial');

      this.transition('running');
      this.failures = 0;

      tasks.push(
        this.guard('listener', epoch.signal, this.listen(subscription, engine, epoch.signal)),
        this.guard('timer', epoch.signal, this.tick(engine, epoch.signal))
      );
      await Promise.race(tasks);
    } finally {
      epoch.abort();
      this.shutdown.signal.removeEventListener('abort', abortEpoch);
      this.router = null;
      await router.close();
      await Promise.allSettled(tasks);
      if (opened) {
        events.emit({ type: 'connection:closed', endpoint: channel.endpoint });
      }
    }
  }

  private async listen(
    subscription: NotificationSubscription,
    engine: SyncEngine,
    signal: AbortSignal
  ): Promise<void> {
    const { events } = this.deps;
    events.emit({ type: 'listener:listening' });

    for await (const notification of subscription) {
      if (notification.method !== GCODE_RESPONSE_NOTIFICATION) continue;

      const line = notification.params[0];
      if (typeof line !== 'string' || !isMeshCompleteLine(line)) continue;

      events.emit({ type: 'trigger:detected', line: line.trim(), settleDelayMs: this.config.settleDelayMs });
      await sleep(this.config.settleDelayMs, signal);
      await engine.refresh('trigger');
      events.emit({ type: 'listener:listening' });
    }
  }

  private async tick(engine: SyncEngine, signal: AbortSignal): Promise<void> {
    const { events } = this.deps;
    const { intervalMs } = this.config;

    while (true) {
      events.emit({ type: 'timer:sleeping', intervalMs });
      await sleep(intervalMs, signal);
      events.emit({ type: 'timer:woke', intervalMs });
      await engine.refresh('periodic');
    }
  }

  /**
   * Report a task failure, unless the epoch was already being torn down
   */
  private async guard(task: SupervisorTask, signal: AbortSignal, run: Promise<void>): Promise<void> {
    try {
      await run;
    } catch (error) {
      if (!signal.aborted && !isAbortError(error)) {
        this.deps.events.emit({ type: 'task:failed', task, error: toError(error) });
      }
      throw error;
    }
  }

  private transition(to: SupervisorState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.deps.events.emit({ type: 'supervisor:state', from, to });
  }
}
