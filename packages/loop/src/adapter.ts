/**
 * EventLoopAdapter - the three loop operations a session needs, with failures
 * raised as {@link RuntimeError}s instead of returned as statuses.
 */

import { Logger } from "@rawecho/kernel";
import { RuntimeError } from "@rawecho/shared";
import { createNodeLoop } from "./node-loop.js";
import type { EventLoop } from "./types.js";

const log = Logger.for("EventLoopAdapter");

export class EventLoopAdapter {
  constructor(private readonly runtime: EventLoop) {}

  get loop(): EventLoop {
    return this.runtime;
  }

  /**
   * Dispatch callbacks until nothing is active or `stop()` is called. Call it
   * again after {@link walkAndCloseAll} to deliver the close callbacks.
   */
  async runUntilStopped(): Promise<void> {
    const status = await this.runtime.run();
    if (status < 0) {
      throw new RuntimeError("run", status);
    }
  }

  stop(): void {
    this.runtime.stop();
  }

  /** Mark every handle that is not already closing. Returns how many were marked. */
  walkAndCloseAll(): number {
    let marked = 0;
    this.runtime.walk((handle) => {
      if (this.runtime.isClosing(handle)) return;
      this.runtime.close(handle);
      marked++;
    });
    log.debug({ marked }, "handles marked for closing");
    return marked;
  }

  close(): void {
    const status = this.runtime.closeLoop();
    if (status < 0) {
      throw new RuntimeError("close_loop", status);
    }
  }
}

export function createEventLoopAdapter(loop: EventLoop = createNodeLoop()): EventLoopAdapter {
  return new EventLoopAdapter(loop);
}
