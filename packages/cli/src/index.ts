/**
 * @rawecho/cli - Terminal front end for the echo session
 *
 * @module @rawecho/cli
 */

export {
  ConfigError,
  getConfigPath,
  loadConfig,
  type CliOptions,
  type Config,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config.js";
export { Renderer, type OutputStream, type RendererOptions } from "./ui/renderer.js";
export {
  EXIT_OK,
  EXIT_SESSION_ERROR,
  EXIT_USAGE,
  echoCommand,
  type EchoCommandContext,
} from "./commands/echo.js";
