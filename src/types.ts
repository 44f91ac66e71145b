/**
 * Core type definitions for Terraform Checks Action
 */

/**
 * Infrastructure CLI flavour
 */
export type ToolName = 'terraform' | 'opentofu';

/**
 * Fully-resolved run configuration
 */
export interface RunConfiguration {
  /** Runner label the caller workflow selected (informational) */
  readonly runnerLabel: string;
  /** Directory the format, lint and scan steps run in */
  readonly workingDirectory: string;
  /** Directory init and validate run in (defaults to workingDirectory) */
  readonly validateDirectory: string;
  /** Terraform or OpenTofu */
  readonly tool: ToolName;
  /** CLI version to install; empty means use whatever is on PATH */
  readonly toolVersion: string;
  /** TFLint version ('latest' or a tag such as v0.50.0) */
  readonly tflintVersion: string;
  /** terraform-docs release tag */
  readonly terraformDocsVersion: string;
  readonly enableSecurityScan: boolean;
  /** Record scanner findings without failing the security job */
  readonly securitySoftFail: boolean;
  readonly enableDocs: boolean;
  /** Docs file, relative to workingDirectory */
  readonly docsOutputFile: string;
  /** Only this PR author may trigger checks; empty means anyone */
  readonly allowedPrAuthor: string;
  readonly mainBranch: string;
  readonly enableDependencyUpdates: boolean;
  readonly renovateConfigFile: string;
  readonly renovateDebug: boolean;
  readonly stepTimeoutMinutes: number;
  /** Upload the JSON run report as a workflow artifact */
  readonly uploadReport: boolean;
}

/**
 * Caller-supplied subset of the run configuration
 */
export type PartialRunConfiguration = {
  -readonly [K in keyof RunConfiguration]?: RunConfiguration[K];
};

/**
 * Kind of event that started the pipeline
 */
export type TriggerKind = 'push' | 'pull_request' | 'manual' | 'schedule' | 'unknown';

/**
 * Why the pipeline runs
 */
export interface TriggerContext {
  readonly kind: TriggerKind;
  /** Raw event name as reported by the platform */
  readonly eventName: string;
  /** Pushed branch, or the base branch of a pull request */
  readonly branch: string;
  /** Login of the user that triggered the event */
  readonly actor: string;
}

export type JobName = 'lint' | 'security' | 'docs' | 'dependency-update';

export type ResultStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped' | 'cancelled';

/**
 * Why a step failed
 */
export type FailureKind = 'tool-reported' | 'execution-error' | 'timeout';

/**
 * Gate decision with the reason behind it
 */
export interface GateDecision {
  readonly run: boolean;
  readonly reason: string;
}

/**
 * Meaning of a single exit code
 */
export interface ExitCodeMeaning {
  readonly status: 'succeeded' | 'failed';
  /** Outcome label recorded on the step result (e.g. 'needs-formatting') */
  readonly outcome?: string;
}

/**
 * Documented exit-code convention of a tool. Codes not listed fail.
 */
export type ExitCodeConvention = Readonly<Record<number, ExitCodeMeaning>>;

/**
 * State visible to step conditions
 */
export interface StepConditionContext {
  readonly config: RunConfiguration;
  readonly trigger: TriggerContext;
  /** Results of the steps that already ran in the same job */
  readonly previous: readonly StepResult[];
}

export interface StepSpec {
  readonly name: string;
  /** argv template; `{{field}}` placeholders are filled from the run configuration */
  readonly command: readonly string[];
  /** Working directory template, relative to the repository root */
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string>>;
  /** Secrets handed to this step as environment variables, by variable name */
  readonly secrets?: Readonly<Record<string, string>>;
  readonly continueOnFailure: boolean;
  readonly condition?: (context: StepConditionContext) => boolean;
  readonly exitCodes?: ExitCodeConvention;
}

/**
 * State visible to job gates
 */
export interface GateContext {
  readonly config: RunConfiguration;
  readonly trigger: TriggerContext;
  /** Jobs finalized so far */
  readonly results: ReadonlyMap<JobName, JobResult>;
}

export interface JobSpec {
  readonly name: JobName;
  readonly steps: readonly StepSpec[];
  readonly gate: (context: GateContext) => GateDecision;
  /** Run only after every other job has finalized */
  readonly runsLast?: boolean;
}

/**
 * Step command after placeholder substitution
 */
export interface RenderedCommand {
  readonly file: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
}

export interface StepResult {
  readonly name: string;
  readonly status: ResultStatus;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly failure?: FailureKind;
  readonly outcome?: string;
  /** Error or skip reason */
  readonly message?: string;
  readonly durationMs: number;
}

export interface JobResult {
  readonly name: JobName;
  readonly status: ResultStatus;
  readonly reason?: string;
  readonly steps: readonly StepResult[];
}

export type PipelineStatus = 'succeeded' | 'failed' | 'noop' | 'cancelled';

export interface PipelineResult {
  readonly status: PipelineStatus;
  readonly exitCode: number;
  readonly jobs: readonly JobResult[];
  /** Job names in the order they finalized */
  readonly completionOrder: readonly JobName[];
}
