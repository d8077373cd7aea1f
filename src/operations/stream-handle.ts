// =============================================================================
// StreamHandle — Single-use async iterable over one operation invocation
// =============================================================================

import { InvalidStateError, InvocationError, StreamshapeError } from "../errors.js";
import type { DecoderOptions } from "../config/runtime-config.js";
import { IncrementalDecoder } from "../decoder/incremental-decoder.js";
import type { DecodedValue } from "../decoder/values.js";
import type { BoundLogger, Logger } from "../logging/logger.js";
import type { SchemaSnapshot } from "../schema/snapshot.js";
import { renderOutputFormat } from "../schema/output-format.js";
import type { RawPayload, ResolvedBinding, StreamEvent, StreamStatus } from "./types.js";

export interface StreamRun {
  /** Bindings to try in order; later ones are fallbacks for earlier ones that fail. */
  readonly candidates: readonly [ResolvedBinding, ...ResolvedBinding[]];
  readonly args: readonly unknown[];
  readonly snapshot: SchemaSnapshot;
  readonly decoder: DecoderOptions;
  readonly logger: Logger;
  readonly log: BoundLogger;
  readonly signal?: AbortSignal;
}

async function* chunksOf(payload: string | Promise<string>): AsyncGenerator<string> {
  yield await payload;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lazily started, single-use view of one invocation.
 *
 * The binding is invoked when iteration begins. Iterating yields partial
 * events followed by exactly one final event; iterating a second time
 * yields nothing.
 *
 * @example
 * ```ts
 * const handle = operations.stream("ExtractUser", [text]);
 * for await (const event of handle) {
 *   if (event.type === "partial") render(event.value);
 *   else save(event.value);
 * }
 * ```
 */
export class StreamHandle<T = DecodedValue> implements AsyncIterable<StreamEvent<T>> {
  private current: StreamStatus = "idle";
  private readonly controller = new AbortController();
  private readonly detach: () => void;
  private active: ResolvedBinding;
  private result: { value: T } | undefined;
  private emitted = 0;
  /** True while an abandoned `next()` is still outstanding. */
  private pulling = false;

  constructor(
    private readonly run: StreamRun,
    private readonly convert: (value: DecodedValue, resolved: ResolvedBinding) => T,
  ) {
    this.active = run.candidates[0];
    const external = run.signal;
    const onAbort = (): void => this.cancel();
    this.detach = () => external?.removeEventListener("abort", onAbort);
    if (external?.aborted) {
      this.cancel();
    } else {
      external?.addEventListener("abort", onAbort, { once: true });
    }
  }

  get status(): StreamStatus {
    return this.current;
  }

  get operation(): string {
    return this.active.operation;
  }

  /** Version of the binding in use (changes when a fallback takes over). */
  get version(): string {
    return this.active.version;
  }

  /**
   * Stop requesting increments and discard the session. No final value is
   * produced; a consumer awaiting the next event sees iteration end.
   */
  cancel(): void {
    this.detach();
    if (this.current === "completed" || this.current === "failed" || this.current === "cancelled") return;
    this.current = "cancelled";
    this.controller.abort();
    this.run.log.info("stream:cancelled", { operation: this.operation, version: this.version });
  }

  /** Drain the stream and return its final value. */
  async final(): Promise<T> {
    if (this.result) return this.result.value;
    if (this.current !== "idle") {
      throw new InvalidStateError(this.current, `Stream for "${this.operation}" is ${this.current}; final() needs an unconsumed handle`);
    }
    for await (const event of this) {
      if (event.type === "final") return event.value;
    }
    throw new InvalidStateError(this.current, `Stream for "${this.operation}" ended without a final value`);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamEvent<T>> {
    if (this.current !== "idle") return;
    this.current = "running";

    const { candidates, log } = this.run;
    const started = Date.now();
    try {
      for (const [index, resolved] of candidates.entries()) {
        this.active = resolved;
        const details = { operation: resolved.operation, version: resolved.version };
        log.info("operation:invoke", details);

        let decoded: DecodedValue | undefined;
        try {
          decoded = yield* this.attempt(resolved);
        } catch (err) {
          const next = candidates[index + 1];
          // once a partial is out, switching bindings could retract it
          if (next === undefined || this.emitted > 0 || !this.isRunning()) throw err;
          log.warn("operation:fallback", { ...details, next: next.version, error: errorMessage(err) });
          continue;
        }
        if (decoded === undefined) return;

        const value = this.convert(decoded, resolved);
        this.result = { value };
        this.current = "completed";
        log.info("operation:complete", { ...details, partials: this.emitted, durationMs: Date.now() - started });
        yield { type: "final", value };
        return;
      }
    } catch (err) {
      if (this.isRunning()) this.current = "failed";
      log.error("operation:failed", {
        operation: this.operation,
        version: this.version,
        code: err instanceof StreamshapeError ? err.code : undefined,
        error: errorMessage(err),
      });
      throw err;
    } finally {
      this.detach();
      // the consumer stopped iterating early
      if (this.isRunning()) {
        this.current = "cancelled";
        this.controller.abort();
      }
    }
  }

  /** One binding's run: yields partials, returns the decoded value, or `undefined` when cancelled. */
  private async *attempt(resolved: ResolvedBinding): AsyncGenerator<StreamEvent<T>, DecodedValue | undefined> {
    const decoder = new IncrementalDecoder({
      snapshot: this.run.snapshot,
      target: resolved.returns,
      options: this.run.decoder,
      logger: this.run.logger,
    });
    const iterator = this.open(resolved)[Symbol.asyncIterator]();
    let exhausted = false;
    try {
      while (this.isRunning()) {
        const step = await this.pull(iterator, resolved);
        if (step.done) {
          exhausted = !this.pulling;
          break;
        }
        if (!this.isRunning()) break;
        const partial = decoder.feed(step.value);
        if (partial !== undefined) {
          this.emitted++;
          yield { type: "partial", value: partial };
        }
      }
    } finally {
      // a pull abandoned by cancel() may never settle, so only idle sources are closed
      if (!exhausted && !this.pulling) await iterator.return?.();
    }
    return this.isRunning() ? decoder.finish() : undefined;
  }

  /** Re-reads the status, which `cancel()` may change while a pull is pending. */
  private isRunning(): boolean {
    return this.current === "running";
  }

  private open(resolved: ResolvedBinding): AsyncIterable<string> {
    const { args, snapshot } = this.run;
    let payload: RawPayload;
    try {
      payload = resolved.binding.invoke(args, {
        operation: resolved.operation,
        version: resolved.version,
        snapshot,
        target: resolved.returns,
        outputFormat: renderOutputFormat(snapshot, resolved.returns),
        signal: this.controller.signal,
      });
    } catch (err) {
      throw new InvocationError(resolved.operation, resolved.version, err);
    }
    return typeof payload === "string" || payload instanceof Promise ? chunksOf(payload) : payload;
  }

  /** Next increment, or done as soon as the handle is cancelled. */
  private async pull(iterator: AsyncIterator<string>, resolved: ResolvedBinding): Promise<IteratorResult<string>> {
    const signal = this.controller.signal;
    if (signal.aborted) return { done: true, value: undefined };

    const next = iterator.next();
    next.catch((err: unknown) => {
      if (signal.aborted) {
        this.run.log.debug("stream:discarded-error", { error: errorMessage(err) });
      }
    });
    let settle: (step: IteratorResult<string>) => void = () => {};
    const aborted = new Promise<IteratorResult<string>>((resolve) => {
      settle = resolve;
    });
    const onAbort = (): void => settle({ done: true, value: undefined });
    signal.addEventListener("abort", onAbort, { once: true });

    this.pulling = true;
    try {
      const step = await Promise.race([next, aborted]);
      this.pulling = signal.aborted && step.done === true;
      return step;
    } catch (err) {
      this.pulling = false;
      throw new InvocationError(resolved.operation, resolved.version, err);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
