/**
 * runEcho - one complete echo session, from binding the terminal to closing
 * the loop.
 */

import { Logger } from "@rawecho/kernel";
import { createEventLoopAdapter, type EventLoopAdapter } from "@rawecho/loop";
import { toEchoError, type EchoError } from "@rawecho/shared";
import { TtySession, type SessionOptions } from "./session.js";

const log = Logger.for("runEcho");

export const GREETING = "This program echoes anything you type! Try it out (Ctrl+C to quit): ";

export interface RunEchoOptions extends SessionOptions {
  /** Loop to run on (default: a Node tty loop) */
  adapter?: EventLoopAdapter;
  /** Aborting requests a cooperative stop */
  signal?: AbortSignal;
}

/**
 * Run an echo session to completion and return its first error, if any.
 *
 * Setup failures (binding, raw mode, reading, the greeting) skip the main
 * loop pass, but the terminal is still restored and every handle closed.
 */
export async function runEcho(options: RunEchoOptions = {}): Promise<EchoError | undefined> {
  const adapter = options.adapter ?? createEventLoopAdapter();

  let session: TtySession;
  try {
    session = TtySession.init(adapter, options);
  } catch (error) {
    const initError = toEchoError(error, "init");
    await disposeLoop(adapter);
    return initError;
  }

  const onAbort = (): void => {
    log.debug("stop requested by signal");
    session.requestStop();
  };

  if (startSession(session)) {
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) {
      session.requestStop();
    }

    try {
      await adapter.runUntilStopped();
    } catch (error) {
      session.fail(toEchoError(error, "run"));
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  return session.shutdown();
}

function startSession(session: TtySession): boolean {
  try {
    session.enterRawMode();
    session.start();
    session.submitWrite(Buffer.from(GREETING));
    return true;
  } catch (error) {
    session.fail(toEchoError(error, "start"));
    return false;
  }
}

/** Close whatever a failed init left bound, then the loop. */
async function disposeLoop(adapter: EventLoopAdapter): Promise<void> {
  try {
    adapter.walkAndCloseAll();
    await adapter.runUntilStopped();
    adapter.close();
  } catch (error) {
    log.warn({ error: String(error) }, "loop disposal after failed init");
  }
}
