import { Inject, Injectable } from '@nestjs/common';
import { spawn, type ChildProcess } from 'child_process';
import { PinoLoggerService } from '../logging/pino-logger.service';
import type {
  ExternalToolInvocation,
  ToolRunRequest,
} from '../interfaces/tool-invocation.interface';

/** Bytes of output kept per stream; older output is dropped first. */
export const MAX_CAPTURED_OUTPUT_BYTES = 8 * 1024;

/**
 * The binary could not be started at all (missing from PATH or not executable).
 */
export class ToolNotFoundError extends Error {
  constructor(
    readonly tool: string,
    readonly command: string,
    readonly code: string,
  ) {
    super(
      code === 'EACCES'
        ? `${tool} (${command}) is not executable`
        : `${tool} (${command}) is not installed or not on PATH`,
    );
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Keeps the last `limit` bytes written to it.
 */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;

    while (this.size > this.limit && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped?.length ?? 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    const tail = joined.length > this.limit ? joined.subarray(joined.length - this.limit) : joined;
    return tail.toString('utf8').trim();
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Runs one external tool to completion under a wall-clock budget.
 *
 * Each tool is started in its own process group so that a timeout can take
 * down everything it forked, not just the direct child.
 */
@Injectable()
export class ProcessRunnerService {
  private readonly logger: PinoLoggerService;

  constructor(@Inject(PinoLoggerService) logger: PinoLoggerService) {
    this.logger = logger.forContext(ProcessRunnerService.name);
  }

  run(request: ToolRunRequest): Promise<ExternalToolInvocation> {
    const { tool, command, args, cwd, env, timeoutMs } = request;

    return new Promise((resolve, reject) => {
      const startedAt = Date.now();
      const stdout = new OutputTail(MAX_CAPTURED_OUTPUT_BYTES);
      const stderr = new OutputTail(MAX_CAPTURED_OUTPUT_BYTES);
      let timedOut = false;
      let settled = false;

      this.logger.debug({ tool, command, args, cwd, timeoutMs }, 'Starting external tool');

      const child = spawn(command, args, {
        cwd,
        env: env ?? process.env,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        this.logger.warn({ tool, pid: child.pid, timeoutMs }, 'External tool timed out, killing process group');
        this.killProcessTree(child);
      }, timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;

        if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EACCES')) {
          reject(new ToolNotFoundError(tool, command, error.code));
          return;
        }
        reject(error);
      });

      child.on('close', (exitCode, signal) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;

        const invocation: ExternalToolInvocation = {
          tool,
          command,
          args,
          exitCode,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs: Date.now() - startedAt,
          timedOut,
        };

        this.logger.debug(
          {
            tool,
            exitCode,
            signal,
            durationMs: invocation.durationMs,
            timedOut,
          },
          'External tool finished',
        );

        resolve(invocation);
      });
    });
  }

  private killProcessTree(child: ChildProcess): void {
    if (child.pid === undefined) return;

    try {
      // Negative pid addresses the whole process group
      process.kill(-child.pid, 'SIGKILL');
    } catch (error) {
      this.logger.debug(
        { pid: child.pid, error: error instanceof Error ? error.message : String(error) },
        'Process group kill failed, killing child directly',
      );
      child.kill('SIGKILL');
    }
  }
}
