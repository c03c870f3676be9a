/**
 * TtySession - raw-mode echo over a pair of terminal handles.
 *
 * The session owns its input handle, output handle and a single reusable
 * write request. Callbacks never capture the session: the handles and the
 * request carry a {@link SlotRef} into a session {@link Arena}, and each
 * callback resolves it. Once shutdown takes the slot, late callbacks resolve
 * nothing and only release what they were handed.
 *
 * ```typescript
 * const session = TtySession.init(adapter);
 * session.enterRawMode();
 * session.start();
 * await adapter.runUntilStopped();
 * const error = await session.shutdown();
 * ```
 */

import { Arena, BufferCell, ErrorSlot, Logger, type SlotRef } from "@rawecho/kernel";
import {
  WriteRequest,
  type AllocCallback,
  type EventLoop,
  type EventLoopAdapter,
  type TerminalHandle,
} from "@rawecho/loop";
import {
  BusyError,
  InitError,
  ModeError,
  RuntimeError,
  StartError,
  WriteError,
  toEchoError,
  type EchoError,
} from "@rawecho/shared";
import { isDone, transition, type SessionEvent, type SessionState } from "./machine.js";
import { echoTransform } from "./transform.js";

const log = Logger.for("TtySession");

export interface SessionOptions {
  /** Terminal descriptor to read from (default: 0) */
  inputFd?: number;
  /** Terminal descriptor to echo to (default: 1) */
  outputFd?: number;
  /** Where the session is registered for its callbacks (default: an arena of its own) */
  registry?: Arena<TtySession>;
}

export class TtySession {
  private readonly error = new ErrorSlot<EchoError>();
  private readonly request = new WriteRequest();
  private readonly slot: SlotRef;
  private pending: BufferCell | undefined;
  private running = false;
  private _state: SessionState = "idle";
  private closing: Promise<EchoError | undefined> | undefined;

  private constructor(
    private readonly adapter: EventLoopAdapter,
    private readonly registry: Arena<TtySession>,
    private readonly input: TerminalHandle,
    private readonly output: TerminalHandle,
  ) {
    this.slot = registry.insert(this);
    input.data = this.slot;
    output.data = this.slot;
    this.request.data = this.slot;
  }

  /**
   * Bind the input handle, then the output handle.
   *
   * @throws InitError naming the bind that failed. An input handle bound
   * before the failure is marked for closing; the next loop pass disposes of it.
   */
  static init(adapter: EventLoopAdapter, options: SessionOptions = {}): TtySession {
    const loop = adapter.loop;

    const input = loop.bindTerminalInput(options.inputFd ?? 0);
    if (!input.handle) {
      throw new InitError("bind_terminal_input", input.status);
    }

    const output = loop.bindTerminalOutput(options.outputFd ?? 1);
    if (!output.handle) {
      loop.close(input.handle);
      throw new InitError("bind_terminal_output", output.status);
    }

    const registry = options.registry ?? new Arena<TtySession>();
    const session = new TtySession(adapter, registry, input.handle, output.handle);
    log.debug(
      { slot: String(session.slot), input: input.handle.fd, output: output.handle.fd },
      "session created",
    );
    return session;
  }

  get state(): SessionState {
    return this._state;
  }

  /** First error recorded so far. */
  get firstError(): EchoError | undefined {
    return this.error.value;
  }

  /** Buffer of the write in flight, if any. */
  get pendingWrite(): BufferCell | undefined {
    return this.pending;
  }

  get isRunning(): boolean {
    return this.running;
  }

  private get loop(): EventLoop {
    return this.adapter.loop;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  enterRawMode(): void {
    const status = this.loop.setRawMode(this.input);
    if (status < 0) {
      throw new ModeError("set_raw_mode", status);
    }
  }

  start(): void {
    const registry = this.registry;
    const status = this.loop.readStart(this.input, allocate, (handle, nread, cell) =>
      TtySession.deliverRead(registry, handle, nread, cell),
    );
    if (status < 0) {
      throw new StartError("start_reading", status);
    }
    this.running = true;
    this.advance("read_started");
  }

  /**
   * Write `bytes` to the output handle. The session takes the bytes over;
   * the caller must not change them afterwards.
   */
  submitWrite(bytes: Uint8Array): void {
    if (this.pending) {
      throw new BusyError("submit_write");
    }

    const cell = BufferCell.wrap(bytes).lend();
    const registry = this.registry;
    const status = this.loop.write(this.request, this.output, cell, (req, result) =>
      TtySession.deliverWrite(registry, req, result),
    );
    if (status < 0) {
      cell.reclaim().release();
      throw new WriteError("submit_write", status);
    }

    this.pending = cell;
    this.advance("write_submitted");
  }

  /** Stop reading. Calling it again does nothing. */
  stop(): void {
    if (!this.running) return;
    this.running = false;

    const status = this.loop.readStop(this.input);
    if (status < 0) {
      throw new RuntimeError("stop_reading", status);
    }
  }

  /** Stop from a callback or signal handler: a failure is recorded, not thrown. */
  requestStop(): void {
    try {
      this.stop();
    } catch (error) {
      this.fail(toEchoError(error, "stop_reading"));
    }
    this.advance("stop_requested");
  }

  /** Record `error` unless an earlier one is held. */
  fail(error: EchoError): boolean {
    const recorded = this.error.record(error);
    if (recorded) {
      log.debug({ operation: error.operation, status: error.status }, "error recorded");
    }
    return recorded;
  }

  /**
   * Tear everything down and return the first error of the session.
   *
   * Every step runs even when an earlier one failed; a failing step only
   * contributes its error. Calling again returns the same result.
   */
  shutdown(): Promise<EchoError | undefined> {
    this.closing ??= this.teardown();
    return this.closing;
  }

  private async teardown(): Promise<EchoError | undefined> {
    this.requestStop();

    const reset = this.loop.resetMode();
    if (reset < 0) {
      this.fail(new RuntimeError("reset_mode", reset));
    }

    await this.runStep();

    const marked = this.adapter.walkAndCloseAll();
    this.advance("handles_closing");

    await this.runStep();
    this.advance("handles_closed");

    try {
      this.adapter.close();
    } catch (error) {
      this.fail(toEchoError(error, "close_loop"));
    }
    this.advance("loop_closed");

    this.registry.take(this.slot);
    log.debug({ marked, state: this._state, error: this.error.value?.message }, "session shut down");
    return this.error.value;
  }

  private async runStep(): Promise<void> {
    try {
      await this.adapter.runUntilStopped();
    } catch (error) {
      this.fail(toEchoError(error, "run"));
    }
  }

  // ==========================================================================
  // Completions
  // ==========================================================================

  private readCompleted(nread: number, cell: BufferCell): void {
    const echo = nread > 0 ? echoTransform(cell.view(nread)) : undefined;
    cell.release();

    if (nread < 0) {
      this.fail(new RuntimeError("read_cb", nread));
      this.requestStop();
      return;
    }
    if (!echo) return;

    try {
      this.submitWrite(echo.bytes);
    } catch (error) {
      this.fail(toEchoError(error, "submit_write"));
    }
    if (echo.terminate) {
      log.debug("interrupt received");
      this.requestStop();
    }
  }

  private writeCompleted(status: number): void {
    const cell = this.pending;
    this.pending = undefined;
    cell?.reclaim().release();

    if (status < 0) {
      log.warn({ status }, "write failed");
    }
    this.advance("write_completed");
  }

  private advance(event: SessionEvent): void {
    if (isDone(this._state)) return;
    const next = transition(this._state, event);
    if (next !== this._state) {
      log.trace({ from: this._state, to: next, event }, "state changed");
      this._state = next;
    }
  }

  // Callbacks reach a session through the arena, never through a captured reference.
  private static deliverRead(
    registry: Arena<TtySession>,
    handle: TerminalHandle,
    nread: number,
    cell: BufferCell,
  ): void {
    cell.reclaim();
    const session = registry.get(handle.data);
    if (!session) {
      log.warn({ slot: String(handle.data), nread }, "read for a released session");
      cell.release();
      return;
    }
    session.readCompleted(nread, cell);
  }

  private static deliverWrite(registry: Arena<TtySession>, req: WriteRequest, status: number): void {
    const session = registry.get(req.data);
    if (!session) {
      log.warn({ slot: String(req.data), status }, "write completion for a released session");
      return;
    }
    session.writeCompleted(status);
  }
}

const allocate: AllocCallback = (_handle, suggestedSize) =>
  BufferCell.allocate(suggestedSize).lend();
