/**
 * NodeLoop - the event loop contract over Node's own libuv, through `node:tty`.
 *
 * Input handles are `tty.ReadStream`s, output handles `tty.WriteStream`s. Stream
 * events feed the shared dispatch queue in {@link BaseLoop}, so callbacks still
 * only fire from inside `run()`.
 */

import type { Socket } from "node:net";
import { ReadStream, WriteStream, isatty } from "node:tty";
import { Logger } from "@rawecho/kernel";
import { UV_EBADF, UV_EINVAL, UV_ENOTTY, statusFromError, type Status } from "@rawecho/shared";
import { BaseLoop, type DeviceEvents } from "./base-loop.js";
import type { TerminalHandle } from "./types.js";

const log = Logger.for("NodeLoop");

export class NodeLoop extends BaseLoop {
  private readonly inputs = new Map<TerminalHandle, ReadStream>();
  private readonly outputs = new Map<TerminalHandle, WriteStream>();
  private readonly detach = new Map<TerminalHandle, () => void>();

  protected openDevice(handle: TerminalHandle): Status {
    let stream: Socket;
    try {
      if (handle.direction === "input") {
        const input = new ReadStream(handle.fd);
        this.inputs.set(handle, input);
        stream = input;
      } else {
        const output = new WriteStream(handle.fd);
        this.outputs.set(handle, output);
        stream = output;
      }
    } catch (error) {
      log.debug({ fd: handle.fd, error: String(error) }, "tty init failed");
      return statusFromError(error);
    }

    // Outside a read, failures reach callers as statuses.
    stream.on("error", (error: Error) => {
      log.debug({ fd: handle.fd, error: error.message }, "stream error");
    });
    return 0;
  }

  protected setDeviceMode(handle: TerminalHandle, raw: boolean): Status {
    const stream = this.inputs.get(handle);
    if (!stream) return UV_EINVAL;
    if (!isatty(handle.fd)) return UV_ENOTTY;

    // setRawMode reports failure by emitting, not throwing.
    let status: Status = 0;
    const onError = (error: Error): void => {
      status = statusFromError(error);
    };
    stream.once("error", onError);
    try {
      stream.setRawMode(raw);
    } catch (error) {
      status = statusFromError(error);
    } finally {
      stream.off("error", onError);
    }
    return status;
  }

  protected startDevice(handle: TerminalHandle, events: DeviceEvents): Status {
    const stream = this.inputs.get(handle);
    if (!stream) return UV_EINVAL;

    const onData = (chunk: Buffer | string): void => {
      events.data(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => events.end();
    const onError = (error: Error): void => events.error(statusFromError(error));

    stream.on("data", onData);
    stream.on("end", onEnd);
    stream.on("error", onError);
    this.detach.set(handle, () => {
      stream.off("data", onData);
      stream.off("end", onEnd);
      stream.off("error", onError);
      stream.pause();
    });

    stream.resume();
    return 0;
  }

  protected stopDevice(handle: TerminalHandle): void {
    this.detach.get(handle)?.();
    this.detach.delete(handle);
  }

  protected writeDevice(
    handle: TerminalHandle,
    bytes: Uint8Array,
    done: (status: Status) => void,
  ): Status {
    const stream = this.outputs.get(handle);
    if (!stream || stream.destroyed) return UV_EBADF;

    stream.write(bytes, (error) => done(error ? statusFromError(error) : 0));
    return 0;
  }

  protected closeDevice(handle: TerminalHandle, done: () => void): void {
    const stream: Socket | undefined = this.inputs.get(handle) ?? this.outputs.get(handle);
    this.inputs.delete(handle);
    this.outputs.delete(handle);

    if (!stream || stream.closed) {
      setImmediate(done);
      return;
    }
    stream.once("close", () => done());
    stream.destroy();
  }
}

export function createNodeLoop(): NodeLoop {
  return new NodeLoop();
}
