/**
 * CLI download and setup logic
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as core from '@actions/core';
import * as exec from '@actions/exec';
import * as tc from '@actions/tool-cache';
import { errorMessage } from './errors';
import { lintDecision } from './gates';
import type { ToolPaths } from './jobs';
import type { RunConfiguration, ToolName, TriggerContext } from './types';

type Platform = 'linux' | 'darwin' | 'windows';

/**
 * A CLI that can be installed from a release archive
 */
export interface ReleaseTool {
  /** Binary name without extension */
  readonly binary: string;
  /** Arguments that print the version (used to verify a CLI on PATH) */
  readonly versionArgs: readonly string[];
  /** Builds the archive URL for a version, platform and architecture */
  readonly url: (version: string, platform: Platform, arch: string) => string;
  /** Whether the archive is a zip on this platform (tar.gz otherwise) */
  readonly zip: (platform: Platform) => boolean;
}

function stripV(version: string): string {
  return version.startsWith('v') ? version.substring(1) : version;
}

function withV(version: string): string {
  return version.startsWith('v') ? version : `v${version}`;
}

export const TFLINT: ReleaseTool = {
  binary: 'tflint',
  versionArgs: ['--version'],
  url: (version, platform, arch) =>
    version === 'latest'
      ? `https://github.com/terraform-linters/tflint/releases/latest/download/tflint_${platform}_${arch}.zip`
      : `https://github.com/terraform-linters/tflint/releases/download/${withV(version)}/tflint_${platform}_${arch}.zip`,
  zip: () => true,
};

export const TERRAFORM_DOCS: ReleaseTool = {
  binary: 'terraform-docs',
  versionArgs: ['--version'],
  url: (version, platform, arch) => {
    const tag = withV(version);
    const extension = platform === 'windows' ? 'zip' : 'tar.gz';
    return `https://github.com/terraform-docs/terraform-docs/releases/download/${tag}/terraform-docs-${tag}-${platform}-${arch}.${extension}`;
  },
  zip: (platform) => platform === 'windows',
};

export const TERRAFORM: ReleaseTool = {
  binary: 'terraform',
  versionArgs: ['version'],
  url: (version, platform, arch) => {
    const number = stripV(version);
    return `https://releases.hashicorp.com/terraform/${number}/terraform_${number}_${platform}_${arch}.zip`;
  },
  zip: () => true,
};

export const OPENTOFU: ReleaseTool = {
  binary: 'tofu',
  versionArgs: ['version'],
  url: (version, platform, arch) => {
    const number = stripV(version);
    return `https://github.com/opentofu/opentofu/releases/download/v${number}/tofu_${number}_${platform}_${arch}.zip`;
  },
  zip: () => true,
};

const INFRA_TOOLS: Readonly<Record<ToolName, ReleaseTool>> = {
  terraform: TERRAFORM,
  opentofu: OPENTOFU,
};

/**
 * Maps Node.js platform to release platform naming
 */
function getPlatform(): Platform {
  const platform = os.platform();

  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'windows';
    default:
      throw new Error(`Unsupported platform: ${platform}`);
  }
}

/**
 * Maps Node.js architecture to release architecture naming
 */
function getArch(): string {
  const arch = os.arch();

  switch (arch) {
    case 'x64':
      return 'amd64';
    case 'arm64':
      return 'arm64';
    case 'arm':
      return 'arm';
    default:
      throw new Error(`Unsupported architecture: ${arch}`);
  }
}

/**
 * Downloads and extracts a release archive
 *
 * @param tool - Tool descriptor
 * @param version - Version or tag to download
 * @returns Path to the binary
 * @throws Error if download or extraction fails, or the archive has no binary
 */
export async function installTool(tool: ReleaseTool, version: string): Promise<string> {
  core.info(`Setting up ${tool.binary} ${version}...`);

  const platform = getPlatform();
  const arch = getArch();
  const url = tool.url(version, platform, arch);

  core.info(`Downloading ${tool.binary} from ${url}`);

  let downloadPath: string;
  try {
    downloadPath = await tc.downloadTool(url);
  } catch (error) {
    throw new Error(`Failed to download ${tool.binary}: ${errorMessage(error)}`);
  }

  let extractedPath: string;
  try {
    extractedPath = tool.zip(platform)
      ? await tc.extractZip(downloadPath)
      : await tc.extractTar(downloadPath);
  } catch (error) {
    throw new Error(`Failed to extract ${tool.binary}: ${errorMessage(error)}`);
  }

  const binaryName = platform === 'windows' ? `${tool.binary}.exe` : tool.binary;
  const binaryPath = path.join(extractedPath, binaryName);

  if (!fs.existsSync(binaryPath)) {
    throw new Error(`${tool.binary} binary not found at ${binaryPath}`);
  }

  if (platform !== 'windows') {
    try {
      fs.chmodSync(binaryPath, 0o755);
    } catch (error) {
      throw new Error(`Failed to make ${tool.binary} executable: ${errorMessage(error)}`);
    }
  }

  core.info(`${tool.binary} setup complete: ${binaryPath}`);

  return binaryPath;
}

/**
 * Validates that a CLI is installed and available
 *
 * @throws Error if the CLI is not found or its version check fails
 */
export async function validateToolInstalled(tool: ReleaseTool): Promise<void> {
  core.info(`Validating ${tool.binary} installation...`);

  try {
    await exec.exec(tool.binary, [...tool.versionArgs]);
  } catch (_error) {
    throw new Error(
      `${tool.binary} is not installed or not available in PATH. ` +
        `Please install it before running this action or pin a version to download.`
    );
  }
}

/**
 * Which jobs may need their tools
 */
export interface ToolNeeds {
  readonly lint: boolean;
  readonly docs: boolean;
}

/**
 * Works out which tools the run can need before any gate is evaluated
 *
 * @remarks
 * Mirrors the gates that do not depend on job results: lint tools when the lint
 * gate can open, terraform-docs only for pushes to the main branch with docs on.
 */
export function toolNeeds(config: RunConfiguration, trigger: TriggerContext): ToolNeeds {
  const lint = trigger.kind !== 'unknown' && lintDecision(config, trigger).run;
  return {
    lint,
    docs: lint && config.enableDocs && trigger.kind === 'push' && trigger.branch === config.mainBranch,
  };
}

/**
 * Runs one tool's setup, falling back to the bare binary name on failure
 *
 * @remarks
 * A tool that cannot be set up only affects the jobs that run it: their step
 * then fails to start (or finds the binary on PATH) inside that job, and the
 * other jobs still run.
 */
async function resolveBinary(tool: ReleaseTool, setup: () => Promise<string>): Promise<string> {
  try {
    return await setup();
  } catch (error) {
    core.warning(`${tool.binary} setup failed, falling back to ${tool.binary} on PATH: ${errorMessage(error)}`);
    return tool.binary;
  }
}

/**
 * Resolves the binaries the jobs run
 *
 * @param config - Run configuration
 * @param needs - Jobs that may run; tools for other jobs are not installed
 * @returns Binary paths (bare names for tools taken from PATH, not needed, or whose setup failed)
 *
 * @remarks
 * The Terraform/OpenTofu CLI comes from PATH unless a version is pinned.
 * TFLint and terraform-docs are always downloaded at their configured versions.
 * Setup failures are logged as warnings and never thrown.
 */
export async function setupTools(config: RunConfiguration, needs: ToolNeeds): Promise<ToolPaths> {
  const infraTool = INFRA_TOOLS[config.tool];

  let toolBin = infraTool.binary;
  if (needs.lint) {
    toolBin = await resolveBinary(infraTool, async () => {
      if (config.toolVersion === '' || config.toolVersion === 'latest') {
        await validateToolInstalled(infraTool);
        return infraTool.binary;
      }
      return installTool(infraTool, config.toolVersion);
    });
  }

  const tflintBin = needs.lint
    ? await resolveBinary(TFLINT, () => installTool(TFLINT, config.tflintVersion))
    : TFLINT.binary;

  const terraformDocsBin = needs.docs
    ? await resolveBinary(TERRAFORM_DOCS, () => installTool(TERRAFORM_DOCS, config.terraformDocsVersion))
    : TERRAFORM_DOCS.binary;

  return { toolBin, tflintBin, terraformDocsBin };
}
