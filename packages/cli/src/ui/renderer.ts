/**
 * Renderer - Terminal output rendering
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { EchoError } from "@rawecho/shared";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RendererOptions {
  /** Force colors on or off (default: detected from the terminal) */
  colors?: boolean;

  /** Where session errors go (default: stdout) */
  output?: OutputStream;

  /** Where usage errors go (default: stderr) */
  errors?: OutputStream;
}

export class Renderer {
  private readonly chalk: ChalkInstance;
  private readonly output: OutputStream;
  private readonly errors: OutputStream;

  constructor(options: RendererOptions = {}) {
    this.chalk = options.colors === undefined ? chalk : new Chalk({ level: options.colors ? 1 : 0 });
    this.output = options.output ?? process.stdout;
    this.errors = options.errors ?? process.stderr;
  }

  /**
   * The line printed when a session ends abnormally
   */
  format(error: EchoError): string {
    return this.chalk.red(error.message);
  }

  /**
   * Print a session error
   */
  failure(error: EchoError): void {
    this.output.write(`${this.format(error)}\n`);
  }

  /**
   * Print a usage error
   */
  usage(message: string): void {
    this.errors.write(`${this.chalk.red(`Error: ${message}`)}\n`);
  }
}
