#!/usr/bin/env -S node --import tsx
/**
 * rawecho CLI - Entry point
 */

import { program } from "commander";
import { LOG_LEVELS } from "@rawecho/kernel";
import { EXIT_USAGE, echoCommand } from "./commands/echo.js";
import type { CliOptions } from "./config.js";

program
  .name("rawecho")
  .description("Echo keystrokes from a raw-mode terminal, control characters made visible")
  .version("0.1.0")
  .option("--log-level <level>", `Log level: ${LOG_LEVELS.join(", ")} (default: silent)`)
  .option("--log-file <path>", "Write logs to a file instead of stderr")
  .option("--input-fd <fd>", "Terminal descriptor to read from (default: 0)")
  .option("--output-fd <fd>", "Terminal descriptor to echo to (default: 1)")
  .exitOverride((error) => {
    // Commander has already printed the problem; --help and --version exit 0.
    process.exit(error.exitCode === 0 ? 0 : EXIT_USAGE);
  })
  .action(async (options: CliOptions) => {
    process.exitCode = await echoCommand(options);
  });

await program.parseAsync();
