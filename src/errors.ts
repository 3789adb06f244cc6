export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ExecutionError extends Error {
  readonly command: string;
  /** null when the process never started */
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, opts: { command: string; exitCode: number | null; stderr: string }) {
    super(message);
    this.name = "ExecutionError";
    this.command = opts.command;
    this.exitCode = opts.exitCode;
    this.stderr = opts.stderr;
  }
}

/** A JSON-lines entry the parser skipped. Reported to callbacks, never thrown. */
export interface MalformedRecord {
  line: number;
  reason: string;
  text: string;
}
