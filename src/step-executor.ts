/**
 * Subprocess execution for pipeline steps
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import * as path from 'node:path';
import { StepExecutionError, StepTimeoutError, errorMessage } from './errors';
import type { RenderedCommand } from './types';

/**
 * Default per-step time budget
 */
export const DEFAULT_STEP_TIMEOUT_MS = 15 * 60 * 1000;

/**
 * Time a child gets to exit after SIGTERM before it is sent SIGKILL
 */
export const KILL_GRACE_MS = 5000;

/**
 * Longest delay setTimeout accepts; larger values fire after 1ms
 */
const MAX_TIMER_MS = 2147483647;

/**
 * The parts of a child process the executor relies on
 */
export interface SpawnedProcess {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFunction = (
  file: string,
  args: string[],
  options: SpawnOptions
) => SpawnedProcess;

/**
 * Raw outcome of one subprocess
 */
export interface StepExecution {
  /** Exit code; null when the process was cancelled */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly cancelled: boolean;
  readonly durationMs: number;
}

export interface ExecuteOptions {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

/**
 * Runs a rendered step command
 */
export interface StepExecutor {
  execute(step: string, command: RenderedCommand, options?: ExecuteOptions): Promise<StepExecution>;
}

export interface ProcessStepExecutorOptions {
  /** Repository root that step working directories are relative to */
  rootDir?: string;
  /** Environment every step inherits */
  baseEnv?: NodeJS.ProcessEnv;
  spawn?: SpawnFunction;
  now?: () => number;
}

/**
 * Removes action inputs from an environment. The runner exposes every input,
 * credentials included, as INPUT_* variables.
 */
export function withoutActionInputs(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const filtered: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('INPUT_')) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}

/**
 * Executes steps as child processes without a shell
 *
 * @remarks
 * - Times out after `timeoutMs`: the child receives SIGTERM and the call rejects with StepTimeoutError
 * - Aborting `signal` sends SIGTERM and resolves with `cancelled: true`
 * - A child still running {@link KILL_GRACE_MS} after SIGTERM is sent SIGKILL
 * - `timeoutMs` is capped at the longest delay a timer can hold
 * - A process that cannot be started rejects with StepExecutionError
 */
export class ProcessStepExecutor implements StepExecutor {
  private readonly rootDir: string;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly spawnImpl: SpawnFunction;
  private readonly now: () => number;

  constructor(options: ProcessStepExecutorOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.baseEnv = withoutActionInputs(options.baseEnv ?? process.env);
    this.spawnImpl = options.spawn ?? ((file, args, spawnOptions) => spawn(file, args, spawnOptions));
    this.now = options.now ?? Date.now;
  }

  execute(step: string, command: RenderedCommand, options: ExecuteOptions = {}): Promise<StepExecution> {
    const timeoutMs = Math.min(options.timeoutMs ?? DEFAULT_STEP_TIMEOUT_MS, MAX_TIMER_MS);
    const { signal } = options;
    const startedAt = this.now();

    if (signal?.aborted) {
      return Promise.resolve({ exitCode: null, stdout: '', stderr: '', cancelled: true, durationMs: 0 });
    }

    return new Promise((resolve, reject) => {
      let child: SpawnedProcess;
      try {
        child = this.spawnImpl(command.file, [...command.args], {
          cwd: path.resolve(this.rootDir, command.cwd),
          env: { ...this.baseEnv, ...command.env },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(new StepExecutionError(step, `Failed to start ${command.file}: ${errorMessage(error)}`));
        return;
      }

      // Raw bytes, decoded once on close
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;

      child.stdout?.on('data', (chunk: Buffer | string) => stdoutChunks.push(toBuffer(chunk)));
      child.stderr?.on('data', (chunk: Buffer | string) => stderrChunks.push(toBuffer(chunk)));

      const terminate = (): void => {
        child.kill('SIGTERM');
        if (killTimer === undefined) {
          killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.once('error', (error) => {
        if (settled) {
          return;
        }
        cleanup();
        reject(new StepExecutionError(step, `Failed to start ${command.file}: ${error.message}`));
      });

      child.once('close', (code, exitSignal) => {
        if (settled) {
          return;
        }
        cleanup();

        const stdout = Buffer.concat(stdoutChunks).toString('utf8');
        const stderr = Buffer.concat(stderrChunks).toString('utf8');
        const durationMs = this.now() - startedAt;

        if (timedOut) {
          reject(new StepTimeoutError(step, timeoutMs));
        } else if (cancelled) {
          resolve({ exitCode: null, stdout, stderr, cancelled: true, durationMs });
        } else if (code === null) {
          reject(new StepExecutionError(step, `${command.file} was terminated by ${exitSignal ?? 'a signal'}`));
        } else {
          resolve({ exitCode: code, stdout, stderr, cancelled: false, durationMs });
        }
      });
    });
  }
}
