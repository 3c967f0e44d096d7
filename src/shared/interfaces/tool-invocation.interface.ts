/**
 * One external tool call, as requested by an adapter.
 */
export interface ToolRunRequest {
  /** Tool role such as `converter`; used in diagnostics. */
  tool: string;
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
}

/**
 * Transient record of one subprocess call.
 *
 * Used for error reporting and timeout handling only; never persisted
 * beyond the job that produced it.
 */
export interface ExternalToolInvocation {
  tool: string;
  command: string;
  args: string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  /** Tail of the captured standard error stream. */
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}
