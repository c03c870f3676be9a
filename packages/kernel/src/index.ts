/**
 * # rawecho Kernel
 *
 * Low-level primitives the echo session is built from.
 *
 * - **Logger** - structured logging over pino, silent until configured
 * - **BufferCell** - a byte buffer whose owner (session or runtime) is tracked
 * - **ErrorSlot** - first-write-wins error holder
 * - **Arena** - generation-checked slots for objects reached through callbacks
 *
 * @module @rawecho/kernel
 */

export * from "./logger.js";
export * from "./buffer-cell.js";
export * from "./error-slot.js";
export * from "./arena.js";
