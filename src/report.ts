/**
 * Run report: job summary table, JSON report and artifact upload
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DefaultArtifactClient } from '@actions/artifact';
import * as core from '@actions/core';
import { errorMessage } from './errors';
import type { PipelineResult, StepResult } from './types';

/**
 * Artifact and file name of the JSON report
 */
export const REPORT_NAME = 'terraform-checks-report';

/**
 * Captured output shown per failed step in the summary
 */
const MAX_OUTPUT_CHARS = 8000;

interface HeaderCell {
  data: string;
  header: boolean;
}

export type TableRow = Array<string | HeaderCell>;

const STATUS_ICONS: Readonly<Record<string, string>> = {
  succeeded: '✅',
  failed: '❌',
  skipped: '⏭️',
  cancelled: '🚫',
  noop: '⏭️',
};

/**
 * Keeps the end of long tool output, where errors usually are
 */
export function tail(text: string, maxChars: number = MAX_OUTPUT_CHARS): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `…${text.substring(text.length - maxChars)}`;
}

function statusCell(status: string): string {
  const icon = STATUS_ICONS[status];
  return icon ? `${icon} ${status}` : status;
}

/**
 * Builds the per-job/per-step status table
 *
 * @example
 * formatResultTable(result)
 * // => [[header cells], ['lint', '', '✅ succeeded', ''], ['', 'fmt', '✅ succeeded', 'formatted'], ...]
 */
export function formatResultTable(result: PipelineResult): TableRow[] {
  const rows: TableRow[] = [
    [
      { data: 'Job', header: true },
      { data: 'Step', header: true },
      { data: 'Status', header: true },
      { data: 'Details', header: true },
    ],
  ];

  for (const job of result.jobs) {
    rows.push([job.name, '', statusCell(job.status), job.reason ?? '']);
    for (const step of job.steps) {
      const details = [
        step.exitCode === null ? '' : `exit ${step.exitCode}`,
        step.outcome ?? '',
        step.status === 'skipped' ? (step.message ?? '') : '',
      ]
        .filter((part) => part !== '')
        .join(', ');
      rows.push(['', step.name, statusCell(step.status), details]);
    }
  }

  return rows;
}

/**
 * Failed steps with their captured output
 */
export function failedSteps(result: PipelineResult): Array<{ job: string; step: StepResult }> {
  return result.jobs.flatMap((job) =>
    job.steps.filter((step) => step.status === 'failed').map((step) => ({ job: job.name, step }))
  );
}

/**
 * Writes the status table and failed step output to the job summary
 */
export async function writeSummary(result: PipelineResult): Promise<void> {
  core.summary
    .addHeading('Terraform checks')
    .addRaw(`Overall: ${statusCell(result.status)} (exit code ${result.exitCode})`, true)
    .addTable(formatResultTable(result));

  for (const { job, step } of failedSteps(result)) {
    const output = [step.stdout, step.stderr, step.message ?? ''].filter((part) => part !== '').join('\n');
    core.summary.addHeading(`${job} / ${step.name}`, 3).addCodeBlock(tail(output));
  }

  await core.summary.write();
}

/**
 * Writes the JSON report
 *
 * @param result - Pipeline result
 * @param directory - Target directory
 * @returns Path to the report file
 */
export function writeReport(result: PipelineResult, directory: string): string {
  const reportPath = path.join(directory, `${REPORT_NAME}.json`);
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(reportPath, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
  return reportPath;
}

/**
 * Uploads the JSON report as a GitHub Actions artifact
 *
 * @param reportPath - Absolute path to the report file
 * @returns Artifact name
 */
export async function uploadReport(reportPath: string): Promise<string> {
  if (!fs.existsSync(reportPath)) {
    throw new Error(`Report file not found: ${reportPath}`);
  }

  core.info(`Uploading run report as artifact: ${REPORT_NAME}`);

  try {
    const artifactClient = new DefaultArtifactClient();
    const uploadResult = await artifactClient.uploadArtifact(
      REPORT_NAME,
      [reportPath],
      path.dirname(reportPath),
      {
        retentionDays: 30,
      }
    );

    core.info(
      `Run report uploaded successfully. Artifact ID: ${uploadResult.id}, Size: ${uploadResult.size} bytes`
    );
    return REPORT_NAME;
  } catch (error) {
    throw new Error(`Failed to upload run report artifact: ${errorMessage(error)}`);
  }
}
