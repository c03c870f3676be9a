/**
 * Configuration loading
 *
 * Priority: CLI flags > environment > `~/.rawecho/config.json`.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import type { LogLevel } from "@rawecho/kernel";

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const FdSchema = z.coerce.number().int().min(0);

/**
 * Config file structure
 */
const ConfigFileSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  logFile: z.string().min(1).optional(),
  inputFd: z.number().int().min(0).optional(),
  outputFd: z.number().int().min(0).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const ConfigSchema = z.object({
  logLevel: LogLevelSchema.default("silent"),
  logFile: z.string().min(1).optional(),
  inputFd: FdSchema.default(0),
  outputFd: FdSchema.default(1),
});

export interface Config {
  logLevel: LogLevel;
  logFile?: string;
  inputFd: number;
  outputFd: number;
}

/** Flags as commander hands them over. */
export interface CliOptions {
  logLevel?: string;
  logFile?: string;
  inputFd?: string;
  outputFd?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Config file to read (default: ~/.rawecho/config.json) */
  configPath?: string;
}

export interface LoadedConfig {
  config: Config;
  /** Problems with the config file, which was skipped. Loggable once logging is set up. */
  warnings: string[];
}

/** A flag or environment value is invalid. */
export class ConfigError extends Error {
  readonly name = "ConfigError";
}

export function getConfigPath(): string {
  return path.join(os.homedir(), ".rawecho", "config.json");
}

function loadConfigFile(configPath: string, warnings: string[]): ConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    warnings.push(`Ignoring ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(content);
  if (!parsed.success) {
    warnings.push(`Ignoring ${configPath}: ${describeIssues(parsed.error)}`);
    return {};
  }
  return parsed.data;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Unset and empty variables both count as absent. */
function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Load configuration from CLI options, environment and config file.
 *
 * @throws ConfigError when a flag or environment variable does not validate
 */
export function loadConfig(cliOptions: CliOptions, options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const warnings: string[] = [];
  const file = loadConfigFile(options.configPath ?? getConfigPath(), warnings);

  const merged = ConfigSchema.safeParse({
    logLevel: cliOptions.logLevel ?? fromEnv(env, "RAWECHO_LOG_LEVEL") ?? file.logLevel,
    logFile: cliOptions.logFile ?? fromEnv(env, "RAWECHO_LOG_FILE") ?? file.logFile,
    inputFd: cliOptions.inputFd ?? fromEnv(env, "RAWECHO_INPUT_FD") ?? file.inputFd,
    outputFd: cliOptions.outputFd ?? fromEnv(env, "RAWECHO_OUTPUT_FD") ?? file.outputFd,
  });
  if (!merged.success) {
    throw new ConfigError(describeIssues(merged.error));
  }

  return { config: merged.data, warnings };
}
