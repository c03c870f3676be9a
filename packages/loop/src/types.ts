/**
 * Event loop contract.
 *
 * The session consumes the runtime through this interface only. Operations
 * return libuv-style statuses (`0` or a negative code) instead of throwing;
 * callers decide which error type a failure becomes.
 */

import type { BufferCell, SlotRef } from "@rawecho/kernel";
import type { Status } from "@rawecho/shared";

export type HandleDirection = "input" | "output";

/**
 * A terminal stream registered with a loop. The loop owns its internal state;
 * callers only get identity and the user-data slot.
 */
export interface TerminalHandle {
  readonly id: number;
  readonly fd: number;
  readonly direction: HandleDirection;
  /** User data, read back by callbacks to find their owner. */
  data: SlotRef | undefined;
}

/**
 * A reusable write request. At most one write may be in flight per request.
 */
export class WriteRequest {
  constructor(public data: SlotRef | undefined = undefined) {}
}

export type BindResult =
  | { handle: TerminalHandle; status: 0 }
  | { handle: null; status: Status };

/**
 * Supplies a buffer for the next read. The returned cell must be lent to the
 * runtime; a cell without capacity (or not lent) turns the read into ENOBUFS.
 */
export type AllocCallback = (handle: TerminalHandle, suggestedSize: number) => BufferCell;

/**
 * Delivers a read. `nread` is a byte count, or a negative status (EOF
 * included). The cell is runtime-owned on entry and always belongs to the
 * callee afterwards.
 */
export type ReadCallback = (handle: TerminalHandle, nread: number, cell: BufferCell) => void;

export type WriteCallback = (req: WriteRequest, status: Status) => void;

export type CloseCallback = (handle: TerminalHandle) => void;

export type WalkCallback = (handle: TerminalHandle) => void;

export interface EventLoop {
  bindTerminalInput(fd: number): BindResult;
  bindTerminalOutput(fd: number): BindResult;

  /** Switch an input handle to raw mode. */
  setRawMode(handle: TerminalHandle): Status;
  /** Restore every handle put into raw mode. Global, like `uv_tty_reset_mode`. */
  resetMode(): Status;

  readStart(handle: TerminalHandle, alloc: AllocCallback, read: ReadCallback): Status;
  /** Stop delivering reads. Returns 0 when the handle is not reading. */
  readStop(handle: TerminalHandle): Status;

  write(req: WriteRequest, handle: TerminalHandle, cell: BufferCell, done: WriteCallback): Status;

  /**
   * Dispatch callbacks until no active handle or request remains, or `stop()`
   * is called. Completion callbacks are only ever dispatched from inside run.
   */
  run(): Promise<Status>;
  stop(): void;

  walk(visit: WalkCallback): void;
  close(handle: TerminalHandle, done?: CloseCallback): void;
  isClosing(handle: TerminalHandle): boolean;
  /** Release the loop. Fails with EBUSY while handles are still registered. */
  closeLoop(): Status;
}
