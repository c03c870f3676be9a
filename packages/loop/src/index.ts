/**
 * # @rawecho/loop
 *
 * The event loop contract a terminal session runs on, and its Node
 * implementation.
 *
 * ```typescript
 * import { createEventLoopAdapter } from "@rawecho/loop";
 *
 * const adapter = createEventLoopAdapter();
 * const { handle, status } = adapter.loop.bindTerminalInput(0);
 * ```
 *
 * An in-process loop for tests lives at `@rawecho/loop/testing`.
 *
 * @module @rawecho/loop
 */

export * from "./types.js";
export { BaseLoop, SUGGESTED_READ_SIZE, type DeviceEvents } from "./base-loop.js";
export { NodeLoop, createNodeLoop } from "./node-loop.js";
export { EventLoopAdapter, createEventLoopAdapter } from "./adapter.js";
