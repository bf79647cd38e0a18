/**
 * ClipboardMonitor — the background capture loop.
 *
 * One sequential loop: sleep → stop check → bounded read → change-marker
 * compare → classify → dedup + store. Unchanged ticks do no further work.
 * A failed or slow read skips the tick; a storage failure drops the tick's
 * effect and the same content is retried on the next tick. Neither stops the loop.
 *
 * Clock and clipboard access are injected so tests drive ticks directly.
 *
 * @module clipboard-monitor
 */

import { setTimeout as sleepFor } from 'timers/promises';
import { createLogger } from './logger';
import { classify, snapshotMarker, type ClassifierOptions } from './content-classifier';
import type { CaptureOutcome, HistoryStore } from './history-store';
import { ClipError, ReadFailureError, StorageError } from '@shared/types';
import type { ClipboardSnapshot, MonitorStatus } from '@shared/types';

const log = createLogger('Monitor');

/** Default polling interval (ms) */
export const DEFAULT_POLL_INTERVAL_MS = 500;

/** A read taking longer than this counts as failed (ms) */
export const DEFAULT_READ_TIMEOUT_MS = 1000;

const EMPTY_MARKER = 'empty';

/** Read access to the OS clipboard */
export interface ClipboardSource {
  /** Current clipboard state, or null when it is empty */
  read(): Promise<ClipboardSnapshot | null>;
}

export interface MonitorClock {
  now(): number;
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: MonitorClock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    try {
      await sleepFor(ms, undefined, { signal });
    } catch (err) {
      if (!signal?.aborted) throw err;
    }
  },
};

export interface MonitorOptions extends ClassifierOptions {
  pollIntervalMs: number;
  readTimeoutMs: number;
  /** Record the content already on the clipboard when the loop starts */
  captureOnStart: boolean;
}

export type TickResult =
  | { status: 'read_failed'; error: ReadFailureError }
  | { status: 'unchanged' }
  | { status: 'ignored' }
  | { status: 'captured'; outcome: CaptureOutcome }
  | { status: 'storage_failed'; error: StorageError };

export type MonitorErrorListener = (error: ClipError) => void;

export class ClipboardMonitor {
  private readonly source: ClipboardSource;
  private readonly store: HistoryStore;
  private readonly clock: MonitorClock;
  private options: MonitorOptions;

  private lastMarker: string | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private errorListeners = new Set<MonitorErrorListener>();

  private startedAt: string | null = null;
  private ticks = 0;
  private captures = 0;
  private readFailures = 0;
  private storageFailures = 0;

  constructor(source: ClipboardSource, store: HistoryStore, options: Partial<MonitorOptions> = {}, clock: MonitorClock = systemClock) {
    this.source = source;
    this.store = store;
    this.clock = clock;
    this.options = {
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
      captureOnStart: false,
      previewLength: store.getOptions().previewLength,
      maxContentLength: 1_000_000,
      ...options,
    };
  }

  /** Takes effect from the next tick */
  setOptions(options: Partial<MonitorOptions>): void {
    this.options = { ...this.options, ...options };
  }

  onError(listener: MonitorErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  // ─── Lifecycle ───

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = new Date(this.clock.now()).toISOString();
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
      this.startedAt = null;
    });
    log.info(`Clipboard monitoring started (every ${this.options.pollIntervalMs}ms)`);
  }

  /**
   * Signal the loop to stop and wait for the in-flight tick to finish.
   */
  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    log.info('Clipboard monitoring stopped');
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * The loop body. Resolves once `signal` aborts; never rejects.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (!this.options.captureOnStart && this.lastMarker === null) {
      await this.prime();
    }

    while (!signal.aborted) {
      await this.clock.sleep(this.options.pollIntervalMs, signal);
      if (signal.aborted) break;

      try {
        await this.tick();
      } catch (err) {
        log.error('Unexpected error in monitor tick:', err);
        this.notifyError(ClipError.from(err));
      }
    }
  }

  /**
   * One pass of the pipeline. Public so tests and a "capture now" trigger can
   * drive it without the loop.
   */
  async tick(): Promise<TickResult> {
    this.ticks++;

    let snapshot: ClipboardSnapshot | null;
    try {
      snapshot = await this.readSnapshot();
    } catch (err) {
      const error = err instanceof ReadFailureError ? err : new ReadFailureError('Clipboard read failed', toError(err));
      this.readFailures++;
      log.debug(`Skipping tick: ${error.message}`);
      return { status: 'read_failed', error };
    }

    const marker = snapshot ? snapshotMarker(snapshot) : EMPTY_MARKER;
    if (marker === this.lastMarker) return { status: 'unchanged' };

    const candidate = snapshot
      ? classify(snapshot, { previewLength: this.options.previewLength, maxContentLength: this.options.maxContentLength })
      : null;
    if (!candidate) {
      this.lastMarker = marker;
      return { status: 'ignored' };
    }

    try {
      const outcome = this.store.applyCapture(candidate);
      this.lastMarker = marker;
      if (outcome.action !== 'touched') this.captures++;
      log.debug(`Captured ${candidate.payload.kind} (${outcome.action}) #${outcome.item.id}`);
      return { status: 'captured', outcome };
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.storageFailures++;
      log.error('Failed to store clipboard capture:', err.toJSON());
      this.notifyError(err);
      return { status: 'storage_failed', error: err };
    }
  }

  getStatus(): MonitorStatus {
    return {
      running: this.isRunning(),
      startedAt: this.startedAt ?? undefined,
      ticks: this.ticks,
      captures: this.captures,
      readFailures: this.readFailures,
      storageFailures: this.storageFailures,
    };
  }

  // ─── Private ───

  /** Remember what is on the clipboard now so it is not recorded as new */
  private async prime(): Promise<void> {
    try {
      const snapshot = await this.readSnapshot();
      this.lastMarker = snapshot ? snapshotMarker(snapshot) : EMPTY_MARKER;
    } catch (err) {
      log.debug('Could not read initial clipboard state:', toError(err).message);
    }
  }

  private readSnapshot(): Promise<ClipboardSnapshot | null> {
    const timeoutMs = this.options.readTimeoutMs;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new ReadFailureError(`Clipboard read timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      Promise.resolve()
        .then(() => this.source.read())
        .then(
          (snapshot) => {
            clearTimeout(timer);
            resolve(snapshot);
          },
          (err: unknown) => {
            clearTimeout(timer);
            reject(err instanceof ReadFailureError ? err : new ReadFailureError('Clipboard read failed', toError(err)));
          },
        );
    });
  }

  private notifyError(error: ClipError): void {
    for (const listener of this.errorListeners) {
      try {
        listener(error);
      } catch (err) {
        log.error('Monitor error listener failed:', err);
      }
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
