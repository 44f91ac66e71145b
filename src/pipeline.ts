/**
 * Pipeline orchestration: gates, job scheduling and aggregation
 */

import * as core from '@actions/core';
import { ResultAggregator } from './aggregator';
import { errorMessage } from './errors';
import { runJob } from './job-runner';
import { buildJobs, type ToolPaths } from './jobs';
import type { SecretStore } from './secrets';
import type { StepExecutor } from './step-executor';
import type { JobSpec, PipelineResult, RunConfiguration, TriggerContext } from './types';

export interface PipelineDependencies {
  readonly executor: StepExecutor;
  readonly tools: ToolPaths;
  readonly secrets?: SecretStore;
  readonly signal?: AbortSignal;
  /** Job catalogue; defaults to the built-in jobs for the configuration */
  readonly jobs?: readonly JobSpec[];
}

/**
 * Runs the pipeline for one trigger
 *
 * @param config - Resolved run configuration
 * @param trigger - Why the pipeline runs
 * @param deps - Executor, tools, secrets and cancellation signal
 * @returns Aggregated pipeline result
 *
 * @remarks
 * Jobs without `runsLast` start together; each is isolated, so one job's failure
 * never stops its siblings. `runsLast` jobs (docs) have their gates evaluated only
 * after every other job has finalized, since they may depend on those results.
 */
export async function runPipeline(
  config: RunConfiguration,
  trigger: TriggerContext,
  deps: PipelineDependencies
): Promise<PipelineResult> {
  const jobs = deps.jobs ?? buildJobs(config);
  const aggregator = new ResultAggregator(jobs.map((job) => job.name));
  const secrets: SecretStore = deps.secrets ?? new Map();

  core.info(
    `Trigger: ${trigger.eventName} (${trigger.kind}) on ${trigger.branch || '<none>'} by ${trigger.actor || '<unknown>'}`
  );
  core.info(`Runner: ${config.runnerLabel}, tool: ${config.tool}`);

  const runGatedJob = async (job: JobSpec): Promise<void> => {
    try {
      const decision = job.gate({ config, trigger, results: aggregator.snapshot() });
      if (!decision.run) {
        core.info(`Skipping job ${job.name}: ${decision.reason}`);
        aggregator.skip(job.name, decision.reason);
        return;
      }

      core.info(`Running job ${job.name}: ${decision.reason}`);
      aggregator.start(job.name);

      const result = await runJob(job, config, trigger, {
        executor: deps.executor,
        tools: deps.tools,
        secrets,
        signal: deps.signal,
      });
      aggregator.finalize({ ...result, reason: decision.reason });
      core.info(`Job ${job.name} ${result.status}`);
    } catch (error) {
      core.error(`Job ${job.name} crashed: ${errorMessage(error)}`);
      aggregator.finalize({ name: job.name, status: 'failed', reason: errorMessage(error), steps: [] });
    }
  };

  await Promise.all(jobs.filter((job) => !job.runsLast).map(runGatedJob));

  for (const job of jobs.filter((candidate) => candidate.runsLast)) {
    await runGatedJob(job);
  }

  return aggregator.complete();
}
