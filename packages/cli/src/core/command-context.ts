/**
 * Command Context - the process surroundings a handler needs
 *
 * This is NOT a framework - just an object holding the streams, environment
 * and terminal, so handlers stay testable without touching `process`.
 */

import { getDisplayConfig, type DisplayConfig } from '@asciihist/utils';
import { readInputLines, type InputSource } from './input-source.js';
import { getTerminalSize, type TerminalLike, type TerminalSize } from './terminal.js';

export interface OutputStream extends TerminalLike {
  write(chunk: string): unknown;
}

/**
 * Options for creating a CommandContext with overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  stdin?: NodeJS.ReadableStream;
  stdout?: OutputStream;
  env?: NodeJS.ProcessEnv;
}

export class CommandContext {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: OutputStream;
  private readonly env: NodeJS.ProcessEnv;
  private _displayConfig: DisplayConfig | null = null;

  constructor(options: CommandContextOptions = {}) {
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
    this.env = options.env ?? process.env;
  }

  /**
   * Environment display defaults (lazy; throws ConfigurationError when invalid)
   */
  displayConfig(): DisplayConfig {
    if (!this._displayConfig) {
      this._displayConfig = getDisplayConfig(this.env);
    }
    return this._displayConfig;
  }

  terminalSize(): TerminalSize {
    return getTerminalSize(this.stdout, this.displayConfig());
  }

  readLines(source: InputSource, maxLines?: number): Promise<string[]> {
    return readInputLines(source, this.stdin, maxLines);
  }

  write(text: string): void {
    this.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }
}
