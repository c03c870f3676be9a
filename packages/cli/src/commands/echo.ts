/**
 * Echo command - run one raw-mode echo session on the terminal
 */

import { Logger } from "@rawecho/kernel";
import { runEcho } from "@rawecho/echo";
import type { EventLoopAdapter } from "@rawecho/loop";
import {
  ConfigError,
  loadConfig,
  type CliOptions,
  type LoadConfigOptions,
  type LoadedConfig,
} from "../config.js";
import { Renderer } from "../ui/renderer.js";

const log = Logger.for("cli");

export const EXIT_OK = 0;
export const EXIT_SESSION_ERROR = 1;
export const EXIT_USAGE = 2;

export interface EchoCommandContext extends LoadConfigOptions {
  /** Loop to run on (default: the Node tty loop) */
  adapter?: EventLoopAdapter;
  renderer?: Renderer;
}

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

/**
 * Returns the process exit code.
 */
export async function echoCommand(
  options: CliOptions,
  context: EchoCommandContext = {},
): Promise<number> {
  const renderer = context.renderer ?? new Renderer();

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(options, context);
  } catch (error) {
    if (error instanceof ConfigError) {
      renderer.usage(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  const { config, warnings } = loaded;
  Logger.configure({ level: config.logLevel, destination: config.logFile });
  for (const warning of warnings) {
    log.warn(warning);
  }
  log.info({ inputFd: config.inputFd, outputFd: config.outputFd }, "starting echo session");

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, "stopping on signal");
    controller.abort();
  };
  for (const signal of STOP_SIGNALS) {
    process.on(signal, onSignal);
  }

  try {
    const error = await runEcho({
      adapter: context.adapter,
      inputFd: config.inputFd,
      outputFd: config.outputFd,
      signal: controller.signal,
    });
    if (error) {
      log.error({ operation: error.operation, status: error.status }, "session failed");
      renderer.failure(error);
      return EXIT_SESSION_ERROR;
    }
    return EXIT_OK;
  } finally {
    for (const signal of STOP_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}
