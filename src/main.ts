/**
 * Main entry point for Terraform Checks Action
 */

import * as os from 'node:os';
import * as core from '@actions/core';
import * as github from '@actions/github';
import { EXIT_CODES } from './aggregator';
import { InvalidConfigurationError, errorMessage } from './errors';
import { loadRunConfiguration } from './inputs';
import { RENOVATE_TOKEN_SECRET } from './jobs';
import { runPipeline } from './pipeline';
import { uploadReport, writeReport, writeSummary } from './report';
import { Secret } from './secrets';
import { ProcessStepExecutor } from './step-executor';
import { setupTools, toolNeeds } from './tool-setup';
import { getTriggerContext } from './trigger';
import type { PipelineResult, RunConfiguration } from './types';

/**
 * Publishes the result: outputs, job summary and report artifact
 *
 * @remarks
 * Summary and artifact failures are warnings; they never change the pipeline outcome.
 */
async function publishResult(result: PipelineResult, config: RunConfiguration): Promise<void> {
  core.setOutput('status', result.status);
  core.setOutput('exit-code', String(result.exitCode));

  try {
    await writeSummary(result);
  } catch (error) {
    core.warning(`Failed to write job summary: ${errorMessage(error)}`);
  }

  try {
    const reportPath = writeReport(result, process.env.RUNNER_TEMP || os.tmpdir());
    core.setOutput('report-path', reportPath);
    if (config.uploadReport) {
      await uploadReport(reportPath);
    }
  } catch (error) {
    core.warning(`Failed to publish run report: ${errorMessage(error)}`);
  }
}

/**
 * Main action execution
 */
async function run(): Promise<void> {
  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    core.warning(`Received ${signal}, cancelling running steps`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const trigger = getTriggerContext(github.context);
    const config = loadRunConfiguration();

    core.info('Starting Terraform Checks Action');

    const secrets = new Map([
      [RENOVATE_TOKEN_SECRET, new Secret(core.getInput('renovate-token'))],
    ]);

    const tools = await setupTools(config, toolNeeds(config, trigger));

    const result = await runPipeline(config, trigger, {
      executor: new ProcessStepExecutor(),
      tools,
      secrets,
      signal: controller.signal,
    });

    await publishResult(result, config);

    if (result.status === 'failed' || result.status === 'cancelled') {
      const failed = result.jobs
        .filter((job) => job.status === 'failed' || job.status === 'cancelled')
        .map((job) => `${job.name} (${job.status})`);
      core.setFailed(`Terraform checks ${result.status}: ${failed.join(', ')}`);
    } else {
      core.info(`Terraform checks ${result.status}`);
    }
    process.exitCode = result.exitCode;
  } catch (error) {
    // Configuration errors abort before any job runs
    core.setFailed(errorMessage(error));
    process.exitCode =
      error instanceof InvalidConfigurationError ? EXIT_CODES.invalidConfiguration : 1;
  } finally {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
  }
}

// Execute main function
void run();
