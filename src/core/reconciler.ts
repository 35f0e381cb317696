import type { Logger } from "../logger.js";
import type { ActuationResult, Actuator } from "./actuator.js";
import type { ControlEvent } from "./control-event.js";
import { DebounceTimer } from "./debounce-timer.js";
import { asErrorMessage } from "./errors.js";
import { EventQueue } from "./event-queue.js";
import { TransportStateMachine } from "./transport-state.js";

export type TransitionReason = "transport" | "manual" | "startup";

export type BatchSummary = {
  target: boolean;
  reason: TransitionReason;
  generation: number;
  succeeded: number;
  failed: number;
  superseded: number;
  results: ActuationResult[];
};

export type ReconcilerEvent =
  | { type: "transition"; payload: { active: boolean; reason: TransitionReason; generation: number; at: number } }
  | { type: "actuation"; payload: BatchSummary }
  | { type: "dropped"; payload: { event: ControlEvent; total: number } };

export type ReconcilerStatus = {
  active: boolean;
  pendingTarget: boolean | null;
  lastChangeAt: number | null;
  generation: number;
  queued: number;
  dropped: number;
  inFlight: number;
  lastBatch: Omit<BatchSummary, "results"> | null;
};

export type ReconcilerOptions = {
  debounceMs: number;
  queueCapacity: number;
  syncOnStart: boolean;
  logger: Logger;
};

function summarize(target: boolean, reason: TransitionReason, generation: number, results: ActuationResult[]): BatchSummary {
  return {
    target,
    reason,
    generation,
    succeeded: results.filter((result) => result.outcome === "success").length,
    superseded: results.filter((result) => result.outcome === "superseded").length,
    failed: results.filter((result) => result.outcome !== "success" && result.outcome !== "superseded").length,
    results,
  };
}

/**
 * Single consumer of control events. Feeds the transport state machine in
 * arrival order and starts one actuation batch per settled transition without
 * waiting for the batch to finish.
 */
export class Reconciler {
  private readonly queue: EventQueue<ControlEvent>;
  private readonly machine: TransportStateMachine;
  private readonly timer: DebounceTimer;
  private readonly inFlight = new Set<Promise<ActuationResult[]>>();
  private readonly listeners = new Set<(event: ReconcilerEvent) => void>();
  private running: Promise<void> | null = null;
  private stopped = false;
  private lastBatch: Omit<BatchSummary, "results"> | null = null;

  constructor(
    private readonly actuator: Actuator,
    private readonly options: ReconcilerOptions,
  ) {
    this.machine = new TransportStateMachine(options.debounceMs);
    this.timer = new DebounceTimer(options.debounceMs, () => this.onQuiet());
    this.queue = new EventQueue<ControlEvent>(options.queueCapacity, (event) => {
      this.options.logger.warn({ event, dropped: this.queue.dropped }, "Control queue full, dropped oldest event");
      this.emit({ type: "dropped", payload: { event, total: this.queue.dropped } });
    });
  }

  submit(event: ControlEvent): boolean {
    return this.queue.push(event);
  }

  start(): void {
    if (this.running || this.stopped) return;
    if (this.options.syncOnStart) {
      void this.dispatch(this.machine.active, "startup");
    }
    this.running = this.consume();
  }

  /** Manual set; transport state is left untouched. */
  override(on: boolean): Promise<ActuationResult[]> {
    return this.dispatch(on, "manual");
  }

  subscribe(listener: (event: ReconcilerEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStatus(): ReconcilerStatus {
    const snapshot = this.machine.snapshot();
    return {
      ...snapshot,
      generation: this.actuator.currentGeneration,
      queued: this.queue.size,
      dropped: this.queue.dropped,
      inFlight: this.inFlight.size,
      lastBatch: this.lastBatch,
    };
  }

  /** Resolves once no actuation batch is in flight. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /** Events still queued are drained without dispatching; no batch starts once this resolves. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.queue.close();
    if (this.running) await this.running;
    this.running = null;
    this.timer.cancel();
    await this.idle();
  }

  private async consume(): Promise<void> {
    for await (const event of this.queue) {
      this.handle(event);
    }
  }

  private handle(event: ControlEvent): void {
    if (this.stopped) return;
    this.options.logger.debug({ signal: event.signal, value: event.value }, "Control event");
    const transition = this.machine.apply(event);
    if (transition !== null) {
      void this.dispatch(transition, "transport");
    }
    if (this.options.debounceMs > 0) {
      this.timer.schedule();
    }
  }

  private onQuiet(): void {
    if (this.stopped) return;
    const now = Date.now();
    const transition = this.machine.settle(now);
    if (transition !== null) {
      void this.dispatch(transition, "transport");
      return;
    }
    const remaining = this.machine.remainingMs(now);
    if (remaining > 0) this.timer.schedule(remaining);
  }

  private dispatch(target: boolean, reason: TransitionReason): Promise<ActuationResult[]> {
    const batch = this.actuator.setAll(target);
    const generation = this.actuator.currentGeneration;
    this.options.logger.info({ target, reason, generation }, `Lights ${target ? "on" : "off"}`);
    this.emit({ type: "transition", payload: { active: target, reason, generation, at: Date.now() } });

    const tracked = batch.then(
      (results) => {
        const summary = summarize(target, reason, generation, results);
        const { results: _results, ...rest } = summary;
        this.lastBatch = rest;
        this.emit({ type: "actuation", payload: summary });
        return results;
      },
      (error: unknown): ActuationResult[] => {
        this.options.logger.error({ target, generation, error: asErrorMessage(error) }, "Actuation batch failed");
        return [];
      },
    );
    this.inFlight.add(tracked);
    void tracked.finally(() => {
      this.inFlight.delete(tracked);
    });
    return tracked;
  }

  private emit(event: ReconcilerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.options.logger.error({ type: event.type, error: asErrorMessage(error) }, "Reconciler listener failed");
      }
    }
  }
}
