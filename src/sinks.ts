// src/sinks.ts
// Console sinks. One is picked at startup and handed to the message logger.

import * as inspector from 'node:inspector';
import type { ConsoleSink } from './types';

/** Minimal writable the stream sink needs; `process.stdout` fits. */
export interface TextWritable {
  write(chunk: string): unknown;
  on?(event: 'error', listener: (err: Error) => void): unknown;
}

const ignoreStreamError = (): void => {};

// One listener per stream, however many sinks share it.
const guarded = new WeakSet<TextWritable>();

/**
 * Stream sink, `process.stdout` by default.
 * A broken stream never reaches the caller: write failures (EPIPE on a closed
 * stdout) arrive as `'error'` events, which the sink listens for and drops.
 */
export class StreamConsoleSink implements ConsoleSink {
  private stream: TextWritable;

  constructor(stream: TextWritable = process.stdout) {
    this.stream = stream;
    if (stream.on && !guarded.has(stream)) {
      stream.on('error', ignoreStreamError);
      guarded.add(stream);
    }
  }

  write(line: string): void {
    try {
      this.stream.write(line + '\n');
    } catch {
      // write() on a destroyed stream may throw; console echo is best-effort
    }
  }
}

/**
 * Mirrors lines to an attached debugger (the inspector protocol console).
 * Writes nothing while no inspector session is open.
 */
export class InspectorConsoleSink implements ConsoleSink {
  write(line: string): void {
    if (inspector.url() === undefined) return;
    inspector.console.log(line);
  }
}

/** Fan out to several sinks in order. */
export class TeeConsoleSink implements ConsoleSink {
  private sinks: ConsoleSink[];

  constructor(...sinks: ConsoleSink[]) {
    this.sinks = sinks;
  }

  write(line: string): void {
    for (const sink of this.sinks) {
      sink.write(line);
    }
  }
}

/**
 * Memory sink for testing or buffering console output
 */
export class MemoryConsoleSink implements ConsoleSink {
  public lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  clear(): void {
    this.lines = [];
  }
}

/**
 * No-op sink that discards all lines
 */
export class NoOpConsoleSink implements ConsoleSink {
  write(_line: string): void {
    // Intentionally empty
  }
}

/**
 * Default console backend, chosen once: stdout, plus the debugger mirror when the
 * process was started with an inspector (`--inspect`) or one may attach later.
 */
export function selectConsoleSink(opts?: { mirrorToDebugger?: boolean }): ConsoleSink {
  const stdout = new StreamConsoleSink();
  return opts?.mirrorToDebugger === false ? stdout : new TeeConsoleSink(stdout, new InspectorConsoleSink());
}
