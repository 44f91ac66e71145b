/**
 * Result aggregation and exit code mapping
 */

import type { JobName, JobResult, PipelineResult, PipelineStatus, ResultStatus } from './types';

/**
 * Process exit codes by failure category
 */
export const EXIT_CODES = {
  success: 0,
  lintFailed: 1,
  securityFailed: 2,
  docsFailed: 3,
  dependencyUpdateFailed: 4,
  invalidConfiguration: 78,
  cancelled: 130,
} as const;

const JOB_FAILURE_CODES: ReadonlyArray<readonly [JobName, number]> = [
  ['lint', EXIT_CODES.lintFailed],
  ['security', EXIT_CODES.securityFailed],
  ['docs', EXIT_CODES.docsFailed],
  ['dependency-update', EXIT_CODES.dependencyUpdateFailed],
];

const FINAL_STATUSES: ReadonlySet<ResultStatus> = new Set<ResultStatus>([
  'succeeded',
  'failed',
  'skipped',
  'cancelled',
]);

/**
 * Sole writer of job results for one pipeline run
 *
 * @remarks
 * Jobs move pending → running → final. A result is finalized once and frozen;
 * finalizing it again throws.
 */
export class ResultAggregator {
  private readonly statuses = new Map<JobName, ResultStatus>();
  private readonly results = new Map<JobName, JobResult>();
  private readonly order: JobName[] = [];

  constructor(jobs: readonly JobName[]) {
    for (const job of jobs) {
      this.statuses.set(job, 'pending');
    }
  }

  /**
   * Marks a job as running
   */
  start(job: JobName): void {
    const status = this.statusOf(job);
    if (status !== 'pending') {
      throw new Error(`Job ${job} cannot start from status ${status}`);
    }
    this.statuses.set(job, 'running');
  }

  /**
   * Records a job whose gate was closed
   */
  skip(job: JobName, reason: string): JobResult {
    return this.finalize({ name: job, status: 'skipped', reason, steps: [] });
  }

  /**
   * Records a finished job
   */
  finalize(result: JobResult): JobResult {
    const status = this.statusOf(result.name);
    if (FINAL_STATUSES.has(status)) {
      throw new Error(`Job ${result.name} was already finalized as ${status}`);
    }
    if (!FINAL_STATUSES.has(result.status)) {
      throw new Error(`Job ${result.name} cannot be finalized as ${result.status}`);
    }

    const frozen: JobResult = Object.freeze({
      ...result,
      steps: Object.freeze(result.steps.map((step) => Object.freeze({ ...step }))),
    });
    this.statuses.set(result.name, result.status);
    this.results.set(result.name, frozen);
    this.order.push(result.name);
    return frozen;
  }

  statusOf(job: JobName): ResultStatus {
    const status = this.statuses.get(job);
    if (status === undefined) {
      throw new Error(`Unknown job: ${job}`);
    }
    return status;
  }

  /**
   * Finalized results so far, by job name
   */
  snapshot(): ReadonlyMap<JobName, JobResult> {
    return new Map(this.results);
  }

  /**
   * Computes the pipeline outcome
   *
   * @throws Error if a job has not been finalized
   */
  complete(): PipelineResult {
    const jobs: JobResult[] = [];
    for (const [name] of this.statuses) {
      const result = this.results.get(name);
      if (!result) {
        throw new Error(`Job ${name} has not finished`);
      }
      jobs.push(result);
    }

    const status = overallStatus(jobs);
    return Object.freeze({
      status,
      exitCode: exitCodeFor(status, jobs),
      jobs: Object.freeze(jobs),
      completionOrder: Object.freeze([...this.order]),
    });
  }
}

/**
 * Overall status: cancelled beats failed; all-skipped is a no-op
 */
export function overallStatus(jobs: readonly JobResult[]): PipelineStatus {
  if (jobs.some((job) => job.status === 'cancelled')) {
    return 'cancelled';
  }
  if (jobs.some((job) => job.status === 'failed')) {
    return 'failed';
  }
  if (jobs.every((job) => job.status === 'skipped')) {
    return 'noop';
  }
  return 'succeeded';
}

/**
 * Maps the pipeline outcome to a process exit code. The first failed job
 * in lint, security, docs, dependency-update order decides the code.
 */
export function exitCodeFor(status: PipelineStatus, jobs: readonly JobResult[]): number {
  if (status === 'cancelled') {
    return EXIT_CODES.cancelled;
  }
  if (status !== 'failed') {
    return EXIT_CODES.success;
  }
  for (const [name, code] of JOB_FAILURE_CODES) {
    if (jobs.some((job) => job.name === name && job.status === 'failed')) {
      return code;
    }
  }
  return EXIT_CODES.lintFailed;
}
