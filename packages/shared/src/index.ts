/**
 * # rawecho Shared
 *
 * Runtime status codes and the error taxonomy shared by every rawecho package.
 *
 * ## Statuses
 *
 * Loop operations return libuv-style statuses: `0` for success, a negative
 * code otherwise. {@link statusName} and {@link statusDescription} resolve the
 * code through Node's libuv error map.
 *
 * ## Errors
 *
 * - **InitError** - binding a terminal handle failed
 * - **ModeError** - raw mode could not be entered
 * - **StartError** - read registration failed
 * - **BusyError** - a write was submitted while one is pending
 * - **WriteError** - the runtime rejected a write
 * - **RuntimeError** - a callback delivered a negative status, or a loop call failed
 *
 * ```typescript
 * import { RuntimeError, UV_EOF } from "@rawecho/shared";
 *
 * new RuntimeError("read_cb", UV_EOF).message;
 * // "Error calling read_cb: end of file (EOF)"
 * ```
 *
 * @module @rawecho/shared
 */

export * from "./status.js";
export * from "./errors.js";
