/**
 * Loop Testing Utilities
 *
 * Provides `createMemoryLoop`, an in-process {@link EventLoop} with a scripted
 * terminal. Input is fed by the test, writes are recorded, and any device
 * operation can be made to fail once.
 *
 * @example
 * ```typescript
 * import { createMemoryLoop } from "@rawecho/loop/testing";
 *
 * const loop = createMemoryLoop().feed("hi");
 * const { handle } = loop.bindTerminalInput(0);
 * // ... readStart, then `await loop.run()` delivers "hi"
 * expect(loop.modeChanges).toEqual([]);
 * ```
 *
 * @module @rawecho/loop/testing
 */

import { UV_ENOTTY, type Status } from "@rawecho/shared";
import { BaseLoop, type DeviceEvents } from "./base-loop.js";
import type { TerminalHandle } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/** Device operations that `failNext` can sabotage. */
export type FailPoint = "open" | "setMode" | "start" | "write";

export interface MemoryLoopOptions {
  /** Whether the input behaves like a terminal (default: true). When false, raw mode fails with ENOTTY. */
  terminal?: boolean;
}

export interface ModeChange {
  fd: number;
  raw: boolean;
}

type InputEvent = (events: DeviceEvents) => void;

// ============================================================================
// Implementation
// ============================================================================

export class MemoryLoop extends BaseLoop {
  /** Copies of every submitted write payload, in submission order. */
  readonly writes: Uint8Array[] = [];
  /** Every successful raw/cooked switch. */
  readonly modeChanges: ModeChange[] = [];
  /** Descriptors whose handles finished closing. */
  readonly closedFds: number[] = [];

  private readonly terminal: boolean;
  private readonly failures = new Map<FailPoint, Status>();
  private readonly readers = new Map<TerminalHandle, DeviceEvents>();
  private readonly backlog: InputEvent[] = [];
  private writeStatus: Status = 0;

  constructor(options: MemoryLoopOptions = {}) {
    super();
    this.terminal = options.terminal ?? true;
  }

  /** Make the next call of the given device operation fail with `status`. */
  failNext(point: FailPoint, status: Status): this {
    this.failures.set(point, status);
    return this;
  }

  /** Status delivered to every later write completion (default: 0). */
  completeWritesWith(status: Status): this {
    this.writeStatus = status;
    return this;
  }

  /** Type bytes into the terminal. Held back until a handle starts reading. */
  feed(input: Uint8Array | string): this {
    const bytes = typeof input === "string" ? Buffer.from(input, "latin1") : Uint8Array.from(input);
    return this.push((events) => events.data(bytes));
  }

  /** Deliver a read that carries no bytes. */
  feedEmptyRead(): this {
    return this.push((events) => events.data(new Uint8Array(0)));
  }

  /** Close the input side, as a hung-up terminal would. */
  feedEnd(): this {
    return this.push((events) => events.end());
  }

  /** Report a read error on the input side. */
  feedError(status: Status): this {
    return this.push((events) => events.error(status));
  }

  /** Everything written so far, decoded byte for byte. */
  output(): string {
    return Buffer.concat(this.writes).toString("latin1");
  }

  // ==========================================================================
  // Device layer
  // ==========================================================================

  protected openDevice(_handle: TerminalHandle): Status {
    return this.consume("open");
  }

  protected setDeviceMode(handle: TerminalHandle, raw: boolean): Status {
    const status = this.consume("setMode");
    if (status < 0) return status;
    if (!this.terminal) return UV_ENOTTY;

    this.modeChanges.push({ fd: handle.fd, raw });
    return 0;
  }

  protected startDevice(handle: TerminalHandle, events: DeviceEvents): Status {
    const status = this.consume("start");
    if (status < 0) return status;

    this.readers.set(handle, events);
    for (const event of this.backlog.splice(0)) {
      event(events);
    }
    return 0;
  }

  protected stopDevice(handle: TerminalHandle): void {
    this.readers.delete(handle);
  }

  protected writeDevice(
    _handle: TerminalHandle,
    bytes: Uint8Array,
    done: (status: Status) => void,
  ): Status {
    const status = this.consume("write");
    if (status < 0) return status;

    this.writes.push(Uint8Array.from(bytes));
    done(this.writeStatus);
    return 0;
  }

  protected closeDevice(handle: TerminalHandle, done: () => void): void {
    this.readers.delete(handle);
    this.closedFds.push(handle.fd);
    done();
  }

  private push(event: InputEvent): this {
    const [events] = this.readers.values();
    if (events) {
      event(events);
    } else {
      this.backlog.push(event);
    }
    return this;
  }

  private consume(point: FailPoint): Status {
    const status = this.failures.get(point) ?? 0;
    this.failures.delete(point);
    return status;
  }
}

export function createMemoryLoop(options: MemoryLoopOptions = {}): MemoryLoop {
  return new MemoryLoop(options);
}
