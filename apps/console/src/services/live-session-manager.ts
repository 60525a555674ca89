/**
 * Live Session Manager
 *
 * - At most one live stream session at a time
 * - Start is a synchronous check-and-transition; stop is idempotent and bounded
 * - Holds the latest snapshot of the active session for cache reads
 * - A worker that settles without a stop request is reported as a fault
 */

import { err, ok, type Result } from "neverthrow";
import type { CandlestickInterval, LiveStreamSpec, Ms, StreamKind } from "@spot-console/core";
import { describeStream } from "@spot-console/core";
import type { LiveSnapshot, LiveStreamPort } from "@spot-console/adapters";
import { logger } from "@spot-console/utils";

const log = logger;

export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionView {
  id: number;
  spec: LiveStreamSpec;
  startedAt: Ms;
  updateCount: number;
  stopping: boolean;
}

export interface SessionHandle {
  id: number;
  spec: LiveStreamSpec;
}

export type SessionError = { type: "already_active"; active: SessionView };

export type StreamFaultReason = "worker_failed" | "worker_ended" | "stop_timeout";

export interface StreamFault {
  session: SessionView;
  reason: StreamFaultReason;
  message: string;
}

export type SessionState = { status: "idle" } | { status: "active"; session: SessionView };

export type UpdateListener = (snapshot: LiveSnapshot, session: SessionView) => void;
export type FaultListener = (fault: StreamFault) => void;
export type StateListener = (state: SessionState) => void;

export interface LiveSessionManagerOptions {
  streams: LiveStreamPort;

  /**
   * Bound on the wait for a worker after its signal is aborted
   */
  stopTimeoutMs?: number;

  now?: () => Ms;
}

interface Session {
  id: number;
  spec: LiveStreamSpec;
  startedAt: Ms;
  controller: AbortController;
  worker: Promise<void>;
  snapshot: LiveSnapshot | undefined;
  updateCount: number;
  stopRequested: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True when a snapshot was produced for exactly this kind/symbol/interval
 */
function matchesRequest(
  snapshot: LiveSnapshot,
  kind: StreamKind,
  symbol: string | undefined,
  interval: CandlestickInterval | undefined,
): boolean {
  if (snapshot.kind !== kind) return false;
  switch (snapshot.kind) {
    case "orderBook":
    case "trades":
      return snapshot.symbol === symbol;
    case "candlesticks":
      return snapshot.symbol === symbol && snapshot.interval === interval;
    case "userData":
      return true;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Manager
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Owns the single live session. Workers only ever see their own signal and emit
 * callback; the session object itself never leaves this class.
 */
export class LiveSessionManager {
  private readonly streams: LiveStreamPort;
  private readonly stopTimeoutMs: number;
  private readonly now: () => Ms;

  private current: Session | null = null;
  private stopping: Promise<void> | null = null;
  private nextId = 1;

  private readonly updateListeners = new Set<UpdateListener>();
  private readonly faultListeners = new Set<FaultListener>();
  private readonly stateListeners = new Set<StateListener>();

  constructor(options: LiveSessionManagerOptions) {
    this.streams = options.streams;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start a session for `spec`. Fails without side effects while any session,
   * including one that is stopping, is present.
   */
  start(spec: LiveStreamSpec): Result<SessionHandle, SessionError> {
    if (this.current) {
      return err({ type: "already_active", active: this.toView(this.current) });
    }

    const controller = new AbortController();
    const session: Session = {
      id: this.nextId++,
      spec,
      startedAt: this.now(),
      controller,
      worker: Promise.resolve(),
      snapshot: undefined,
      updateCount: 0,
      stopRequested: false,
    };
    this.current = session;

    const emit = (snapshot: LiveSnapshot): void => {
      this.acceptSnapshot(session, snapshot);
    };

    session.worker = this.runWorker(session, emit);

    log.info("Live session started", { id: session.id, stream: describeStream(spec) });
    this.emitState();

    return ok({ id: session.id, spec });
  }

  /**
   * Stop the active session. No-op while idle; concurrent calls share one stop.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;

    const session = this.current;
    if (!session) return Promise.resolve();

    this.stopping = this.teardown(session).finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Latest snapshot when the active, non-stopping session exactly matches
   */
  snapshotFor(kind: StreamKind, symbol?: string, interval?: CandlestickInterval): LiveSnapshot | undefined {
    const session = this.current;
    if (!session || session.stopRequested || !session.snapshot) return undefined;
    return matchesRequest(session.snapshot, kind, symbol, interval) ? session.snapshot : undefined;
  }

  activeView(): SessionView | undefined {
    return this.current ? this.toView(this.current) : undefined;
  }

  getState(): SessionState {
    return this.current ? { status: "active", session: this.toView(this.current) } : { status: "idle" };
  }

  // ===========================================================================
  // Listeners
  // ===========================================================================

  onUpdate(listener: UpdateListener): () => void {
    this.updateListeners.add(listener);
    return () => this.updateListeners.delete(listener);
  }

  onFault(listener: FaultListener): () => void {
    this.faultListeners.add(listener);
    return () => this.faultListeners.delete(listener);
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private acceptSnapshot(session: Session, snapshot: LiveSnapshot): void {
    // Late events from a stopped or replaced session are dropped
    if (this.current !== session || session.stopRequested) return;

    session.snapshot = Object.freeze(snapshot);
    session.updateCount++;

    const view = this.toView(session);
    for (const listener of this.updateListeners) {
      try {
        listener(session.snapshot, view);
      } catch (error) {
        log.error("Update listener failed", { error });
      }
    }
  }

  /**
   * Runs the worker to completion. Never rejects.
   */
  private async runWorker(session: Session, emit: (snapshot: LiveSnapshot) => void): Promise<void> {
    try {
      await this.streams.run(session.spec, { signal: session.controller.signal, emit });
      if (!session.stopRequested) {
        this.fail(session, "worker_ended", "Stream ended unexpectedly");
      }
    } catch (error) {
      if (!session.stopRequested) {
        this.fail(session, "worker_failed", toErrorMessage(error));
      } else {
        log.debug("Worker error after stop", { id: session.id, error });
      }
    }
  }

  private fail(session: Session, reason: StreamFaultReason, message: string): void {
    if (this.current !== session) return;

    const view = this.toView(session);
    session.controller.abort();
    session.snapshot = undefined;
    this.current = null;

    log.debug("Live session faulted", { id: session.id, reason, message });
    this.emitFault({ session: view, reason, message });
    this.emitState();
  }

  private async teardown(session: Session): Promise<void> {
    session.stopRequested = true;
    session.controller.abort();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
    });

    try {
      const expired = await Promise.race([session.worker.then(() => false), timedOut]);
      if (expired) {
        const message = `Worker did not finish within ${this.stopTimeoutMs}ms`;
        log.debug("Live session stop timed out", { id: session.id, timeoutMs: this.stopTimeoutMs });
        this.emitFault({ session: this.toView(session), reason: "stop_timeout", message });
      }
    } finally {
      clearTimeout(timer);
    }

    session.snapshot = undefined;
    if (this.current === session) {
      this.current = null;
      log.info("Live session stopped", { id: session.id, stream: describeStream(session.spec) });
      this.emitState();
    }
  }

  private toView(session: Session): SessionView {
    return {
      id: session.id,
      spec: session.spec,
      startedAt: session.startedAt,
      updateCount: session.updateCount,
      stopping: session.stopRequested,
    };
  }

  private emitFault(fault: StreamFault): void {
    for (const listener of this.faultListeners) {
      try {
        listener(fault);
      } catch (error) {
        log.error("Fault listener failed", { error });
      }
    }
  }

  private emitState(): void {
    const state = this.getState();
    for (const listener of this.stateListeners) {
      try {
        listener(state);
      } catch (error) {
        log.error("State listener failed", { error });
      }
    }
  }
}
