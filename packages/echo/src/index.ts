/**
 * # @rawecho/echo
 *
 * The echo session: raw-mode terminal input, escaped and echoed back.
 *
 * ```typescript
 * import { runEcho } from "@rawecho/echo";
 *
 * const error = await runEcho();
 * if (error) console.log(error.message);
 * ```
 *
 * @module @rawecho/echo
 */

export { CTRL_C, echoTransform, type EchoOutput } from "./transform.js";
export { transition, isDone, type SessionEvent, type SessionState } from "./machine.js";
export { TtySession, type SessionOptions } from "./session.js";
export { GREETING, runEcho, type RunEchoOptions } from "./run.js";
