/**
 * Sequential step execution for a single job
 */

import * as core from '@actions/core';
import { StepTimeoutError, errorMessage } from './errors';
import { interpretExitCode, renderStep, templateVariables, type ToolPaths } from './jobs';
import type { SecretStore } from './secrets';
import type { StepExecutor } from './step-executor';
import type {
  JobResult,
  JobSpec,
  RunConfiguration,
  StepResult,
  StepSpec,
  TriggerContext,
} from './types';

export interface JobRunnerOptions {
  readonly executor: StepExecutor;
  readonly tools: ToolPaths;
  readonly secrets: SecretStore;
  readonly signal?: AbortSignal;
}

function skippedStep(name: string, message: string): StepResult {
  return { name, status: 'skipped', exitCode: null, stdout: '', stderr: '', message, durationMs: 0 };
}

/**
 * Logs a finished step in one collapsed group. Groups are written in one go so
 * that concurrently running jobs do not interleave group markers.
 */
function logStep(job: string, result: StepResult, commandLine: string): void {
  core.startGroup(`${job} / ${result.name}: ${result.status}`);
  try {
    if (commandLine) {
      core.info(`$ ${commandLine}`);
    }
    if (result.stdout) {
      core.info(result.stdout.trimEnd());
    }
    if (result.stderr) {
      core.info(result.stderr.trimEnd());
    }
    if (result.message) {
      core.info(result.message);
    }
  } finally {
    core.endGroup();
  }
}

/**
 * Renders and executes one step
 *
 * @remarks
 * Never throws: start failures and timeouts become failed results with the
 * matching failure kind.
 */
async function runStep(
  job: JobSpec,
  step: StepSpec,
  variables: Readonly<Record<string, string>>,
  timeoutMs: number,
  options: JobRunnerOptions
): Promise<StepResult> {
  const startedAt = Date.now();
  let commandLine = '';
  let result: StepResult;

  try {
    const command = renderStep(step, variables, options.secrets);
    commandLine = `${[command.file, ...command.args].join(' ')} (in ${command.cwd})`;

    const execution = await options.executor.execute(step.name, command, {
      timeoutMs,
      signal: options.signal,
    });

    if (execution.cancelled || execution.exitCode === null) {
      result = {
        name: step.name,
        status: 'cancelled',
        exitCode: null,
        stdout: execution.stdout,
        stderr: execution.stderr,
        message: 'cancelled',
        durationMs: execution.durationMs,
      };
    } else {
      const meaning = interpretExitCode(step, execution.exitCode);
      result = {
        name: step.name,
        status: meaning.status,
        exitCode: execution.exitCode,
        stdout: execution.stdout,
        stderr: execution.stderr,
        failure: meaning.status === 'failed' ? 'tool-reported' : undefined,
        outcome: meaning.outcome,
        message:
          meaning.status === 'failed'
            ? `${step.name} exited with code ${execution.exitCode}`
            : undefined,
        durationMs: execution.durationMs,
      };
    }
  } catch (error) {
    result = {
      name: step.name,
      status: 'failed',
      exitCode: null,
      stdout: '',
      stderr: '',
      failure: error instanceof StepTimeoutError ? 'timeout' : 'execution-error',
      message: errorMessage(error),
      durationMs: Date.now() - startedAt,
    };
  }

  logStep(job.name, result, commandLine);
  if (result.status === 'failed') {
    core.error(`${job.name} / ${step.name}: ${result.message ?? 'failed'}`);
  }
  return result;
}

/**
 * Runs a job's steps strictly in order
 *
 * @param job - Job whose gate is open
 * @param config - Run configuration the step templates are rendered from
 * @param trigger - Trigger context passed to step conditions
 * @param options - Executor, tool paths, secrets and cancellation signal
 * @returns Job result (status failed, succeeded or cancelled)
 *
 * @remarks
 * - A failed step stops the job unless it is marked continue-on-failure
 * - Timeouts and start failures stop the job even for continue-on-failure steps
 * - Steps after the stopping point are recorded as skipped
 * - Steps whose condition is false are skipped without stopping the job
 */
export async function runJob(
  job: JobSpec,
  config: RunConfiguration,
  trigger: TriggerContext,
  options: JobRunnerOptions
): Promise<JobResult> {
  const variables = templateVariables(config, options.tools);
  const timeoutMs = config.stepTimeoutMinutes * 60 * 1000;
  const steps: StepResult[] = [];
  let status: 'succeeded' | 'failed' | 'cancelled' = 'succeeded';
  let haltReason: string | undefined;

  for (const step of job.steps) {
    if (haltReason === undefined && options.signal?.aborted) {
      status = 'cancelled';
      haltReason = 'pipeline cancelled';
    }

    if (haltReason !== undefined) {
      steps.push(skippedStep(step.name, haltReason));
      continue;
    }

    if (step.condition && !step.condition({ config, trigger, previous: steps })) {
      core.info(`${job.name} / ${step.name}: condition not met, skipping`);
      steps.push(skippedStep(step.name, 'condition not met'));
      continue;
    }

    const result = await runStep(job, step, variables, timeoutMs, options);
    steps.push(result);

    if (result.status === 'cancelled') {
      status = 'cancelled';
      haltReason = 'pipeline cancelled';
    } else if (result.status === 'failed') {
      if (step.continueOnFailure && result.failure === 'tool-reported') {
        core.warning(`${job.name} / ${step.name} failed; continuing because the step allows failure`);
      } else {
        status = 'failed';
        haltReason = `step ${step.name} failed`;
      }
    }
  }

  return { name: job.name, status, steps };
}
