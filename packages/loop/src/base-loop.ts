/**
 * BaseLoop - dispatch, bookkeeping and handle lifecycle shared by every loop.
 *
 * Subclasses provide the device layer (open a stream, toggle raw mode, start
 * and stop reading, write, close). Device notifications are queued and only
 * dispatched while `run()` is in progress, which is what makes closing a
 * handle need a second pass: `close()` marks it, the next `run()` delivers the
 * close callback.
 *
 * Within a pass, completions (writes, closes) are dispatched before queued
 * input, the way libuv runs pending callbacks before polling for I/O.
 */

import { Logger, type BufferCell } from "@rawecho/kernel";
import {
  UV_EALREADY,
  UV_EBADF,
  UV_EBUSY,
  UV_EINVAL,
  UV_ENOBUFS,
  UV_EOF,
  type Status,
} from "@rawecho/shared";
import type {
  AllocCallback,
  BindResult,
  CloseCallback,
  EventLoop,
  HandleDirection,
  ReadCallback,
  TerminalHandle,
  WalkCallback,
  WriteCallback,
  WriteRequest,
} from "./types.js";

const log = Logger.for("EventLoop");

/** Buffer size offered to allocation callbacks, as libuv does for streams. */
export const SUGGESTED_READ_SIZE = 65536;

/** Notifications a device reports back while a handle is reading. */
export interface DeviceEvents {
  data(chunk: Uint8Array): void;
  end(): void;
  error(status: Status): void;
}

interface Reader {
  alloc: AllocCallback;
  read: ReadCallback;
}

interface HandleState {
  raw: boolean;
  closing: boolean;
  reader: Reader | undefined;
}

type Task = () => void;

export abstract class BaseLoop implements EventLoop {
  private readonly handles = new Map<TerminalHandle, HandleState>();
  private readonly inFlight = new WeakSet<WriteRequest>();
  private readonly completions: Task[] = [];
  private readonly input: Task[] = [];
  private nextId = 1;
  private pendingWrites = 0;
  private running = false;
  private draining = false;
  private drainScheduled = false;
  private stopRequested = false;
  private closed = false;
  private settle: ((status: Status) => void) | undefined;
  private abort: ((error: unknown) => void) | undefined;

  protected abstract openDevice(handle: TerminalHandle): Status;
  protected abstract setDeviceMode(handle: TerminalHandle, raw: boolean): Status;
  protected abstract startDevice(handle: TerminalHandle, events: DeviceEvents): Status;
  protected abstract stopDevice(handle: TerminalHandle): void;
  protected abstract writeDevice(
    handle: TerminalHandle,
    bytes: Uint8Array,
    done: (status: Status) => void,
  ): Status;
  protected abstract closeDevice(handle: TerminalHandle, done: () => void): void;

  // ==========================================================================
  // Handles
  // ==========================================================================

  bindTerminalInput(fd: number): BindResult {
    return this.bind(fd, "input");
  }

  bindTerminalOutput(fd: number): BindResult {
    return this.bind(fd, "output");
  }

  private bind(fd: number, direction: HandleDirection): BindResult {
    if (this.closed) return { handle: null, status: UV_EINVAL };
    if (!Number.isInteger(fd) || fd < 0) return { handle: null, status: UV_EBADF };

    const handle: TerminalHandle = { id: this.nextId++, fd, direction, data: undefined };
    const status = this.openDevice(handle);
    if (status < 0) {
      log.debug({ fd, direction, status }, "bind failed");
      return { handle: null, status };
    }

    this.handles.set(handle, { raw: false, closing: false, reader: undefined });
    log.debug({ id: handle.id, fd, direction }, "handle bound");
    return { handle, status: 0 };
  }

  setRawMode(handle: TerminalHandle): Status {
    const state = this.handles.get(handle);
    if (!state || state.closing) return UV_EBADF;
    if (handle.direction !== "input") return UV_EINVAL;
    if (state.raw) return 0;

    const status = this.setDeviceMode(handle, true);
    if (status === 0) state.raw = true;
    return status;
  }

  resetMode(): Status {
    let result: Status = 0;
    for (const [handle, state] of this.handles) {
      if (!state.raw) continue;
      const status = this.setDeviceMode(handle, false);
      if (status < 0) {
        if (result === 0) result = status;
        continue;
      }
      state.raw = false;
    }
    return result;
  }

  isClosing(handle: TerminalHandle): boolean {
    const state = this.handles.get(handle);
    return !state || state.closing;
  }

  walk(visit: WalkCallback): void {
    for (const handle of [...this.handles.keys()]) {
      visit(handle);
    }
  }

  close(handle: TerminalHandle, done?: CloseCallback): void {
    const state = this.handles.get(handle);
    if (!state || state.closing) return;

    if (state.reader) {
      state.reader = undefined;
      this.stopDevice(handle);
    }
    if (state.raw) {
      // The device is gone after this; leave the terminal cooked.
      const status = this.setDeviceMode(handle, false);
      if (status < 0) log.warn({ id: handle.id, status }, "mode reset on close failed");
      state.raw = false;
    }

    state.closing = true;
    this.closeDevice(handle, () => {
      this.complete(() => {
        this.handles.delete(handle);
        log.debug({ id: handle.id }, "handle closed");
        done?.(handle);
      });
    });
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  readStart(handle: TerminalHandle, alloc: AllocCallback, read: ReadCallback): Status {
    const state = this.handles.get(handle);
    if (!state || state.closing) return UV_EBADF;
    if (handle.direction !== "input") return UV_EINVAL;
    if (state.reader) return UV_EALREADY;

    const status = this.startDevice(handle, {
      data: (chunk) => this.enqueueInput(() => this.deliver(handle, chunk)),
      end: () => this.enqueueInput(() => this.finishReading(handle, UV_EOF)),
      error: (code) => this.enqueueInput(() => this.finishReading(handle, code)),
    });
    if (status < 0) return status;

    state.reader = { alloc, read };
    return 0;
  }

  readStop(handle: TerminalHandle): Status {
    const state = this.handles.get(handle);
    if (!state?.reader) return 0;

    state.reader = undefined;
    this.stopDevice(handle);
    // A stop from outside a callback still has to let run() settle.
    this.schedule();
    return 0;
  }

  private deliver(handle: TerminalHandle, chunk: Uint8Array): void {
    // An empty chunk still costs one allocation and a zero-length read.
    let offset = 0;
    do {
      const reader = this.handles.get(handle)?.reader;
      if (!reader) {
        log.trace({ id: handle.id, dropped: chunk.length - offset }, "input after read stop");
        return;
      }

      const cell = reader.alloc(handle, SUGGESTED_READ_SIZE);
      if (cell.owner !== "runtime" || cell.capacity === 0) {
        reader.read(handle, UV_ENOBUFS, cell);
        return;
      }

      const nread = Math.min(cell.capacity, chunk.length - offset);
      cell.storage().set(chunk.subarray(offset, offset + nread));
      offset += nread;
      reader.read(handle, nread, cell);
    } while (offset < chunk.length);
  }

  private finishReading(handle: TerminalHandle, status: Status): void {
    const state = this.handles.get(handle);
    const reader = state?.reader;
    if (!state || !reader) return;

    state.reader = undefined;
    this.stopDevice(handle);
    reader.read(handle, status, reader.alloc(handle, SUGGESTED_READ_SIZE));
  }

  // ==========================================================================
  // Writing
  // ==========================================================================

  write(req: WriteRequest, handle: TerminalHandle, cell: BufferCell, done: WriteCallback): Status {
    const state = this.handles.get(handle);
    if (!state || state.closing) return UV_EBADF;
    if (handle.direction !== "output") return UV_EINVAL;
    if (this.inFlight.has(req)) return UV_EBUSY;
    if (cell.owner !== "runtime") return UV_EINVAL;

    this.inFlight.add(req);
    this.pendingWrites++;

    const status = this.writeDevice(handle, cell.storage().subarray(0, cell.length), (result) => {
      this.complete(() => {
        this.inFlight.delete(req);
        this.pendingWrites--;
        done(req, result);
      });
    });

    if (status < 0) {
      this.inFlight.delete(req);
      this.pendingWrites--;
    }
    return status;
  }

  // ==========================================================================
  // Running
  // ==========================================================================

  run(): Promise<Status> {
    if (this.closed) return Promise.resolve(UV_EINVAL);
    if (this.running) return Promise.resolve(UV_EBUSY);

    return new Promise<Status>((resolve, reject) => {
      this.running = true;
      this.settle = resolve;
      this.abort = reject;
      this.drain();
    });
  }

  stop(): void {
    if (!this.running) return;
    this.stopRequested = true;
    if (!this.draining) this.finish(0);
  }

  closeLoop(): Status {
    if (this.closed) return 0;
    if (this.running || this.handles.size > 0) return UV_EBUSY;
    this.closed = true;
    this.completions.length = 0;
    this.input.length = 0;
    return 0;
  }

  /** Whether anything would keep `run()` going. */
  protected alive(): boolean {
    if (this.pendingWrites > 0) return true;
    for (const state of this.handles.values()) {
      if (state.reader || state.closing) return true;
    }
    return false;
  }

  private complete(task: Task): void {
    this.completions.push(task);
    this.schedule();
  }

  private enqueueInput(task: Task): void {
    this.input.push(task);
    this.schedule();
  }

  private schedule(): void {
    if (!this.running || this.draining || this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    if (!this.running || this.draining) return;

    this.draining = true;
    try {
      while (!this.stopRequested) {
        const task = this.completions.shift() ?? this.input.shift();
        if (!task) break;
        task();
      }
    } catch (error) {
      this.draining = false;
      this.fail(error);
      return;
    }
    this.draining = false;

    if (this.stopRequested || !this.alive()) {
      this.finish(0);
    }
  }

  private finish(status: Status): void {
    if (!this.running) return;
    const settle = this.settle;
    this.reset();
    settle?.(status);
  }

  private fail(error: unknown): void {
    if (!this.running) return;
    const abort = this.abort;
    this.reset();
    log.error({ error: error instanceof Error ? error.message : String(error) }, "callback threw");
    abort?.(error);
  }

  private reset(): void {
    this.running = false;
    this.stopRequested = false;
    this.settle = undefined;
    this.abort = undefined;
  }
}
