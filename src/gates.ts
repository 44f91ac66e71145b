/**
 * Job gate evaluation
 */

import * as core from '@actions/core';
import { GateEvaluationError } from './errors';
import type { GateContext, GateDecision, RunConfiguration, TriggerContext } from './types';

function run(reason: string): GateDecision {
  return { run: true, reason };
}

function skip(reason: string): GateDecision {
  return { run: false, reason };
}

/**
 * Throws for trigger kinds the gates cannot reason about
 */
function assertKnownTrigger(trigger: TriggerContext): void {
  if (trigger.kind === 'unknown') {
    throw new GateEvaluationError(`Unrecognized trigger event: ${trigger.eventName}`);
  }
}

/**
 * Wraps a gate so that evaluation errors skip the job instead of running it
 */
function failClosed(
  gate: (context: GateContext) => GateDecision
): (context: GateContext) => GateDecision {
  return (context) => {
    try {
      assertKnownTrigger(context.trigger);
      return gate(context);
    } catch (error) {
      if (error instanceof GateEvaluationError) {
        core.warning(`${error.message}; skipping job`);
        return skip(error.message);
      }
      throw error;
    }
  };
}

/**
 * Lint gate: open to everyone unless a PR author restriction excludes the actor
 */
export function lintDecision(config: RunConfiguration, trigger: TriggerContext): GateDecision {
  if (
    config.allowedPrAuthor !== '' &&
    trigger.kind === 'pull_request' &&
    trigger.actor !== config.allowedPrAuthor
  ) {
    return skip(`pull request author ${trigger.actor} is not ${config.allowedPrAuthor}`);
  }
  return run('checks enabled for this trigger');
}

export const lintGate = failClosed(({ config, trigger }) => lintDecision(config, trigger));

export const securityGate = failClosed(({ config, trigger }) => {
  if (!config.enableSecurityScan) {
    return skip('security scan disabled');
  }
  const lint = lintDecision(config, trigger);
  return lint.run ? run('security scan enabled') : lint;
});

/**
 * Docs gate: only pushes to the main branch after a successful lint job.
 * Pull requests never write docs back to the repository.
 */
export const docsGate = failClosed(({ config, trigger, results }) => {
  if (!config.enableDocs) {
    return skip('docs generation disabled');
  }
  if (trigger.kind !== 'push') {
    return skip(`docs only run on push, not ${trigger.kind}`);
  }
  if (trigger.branch !== config.mainBranch) {
    return skip(`docs only run on ${config.mainBranch}, not ${trigger.branch}`);
  }
  const lintStatus = results.get('lint')?.status ?? 'pending';
  if (lintStatus !== 'succeeded') {
    return skip(`lint job is ${lintStatus}`);
  }
  return run(`push to ${config.mainBranch} with passing lint`);
});

export const dependencyUpdateGate = failClosed(({ config, trigger }) => {
  if (!config.enableDependencyUpdates) {
    return skip('dependency updates disabled');
  }
  if (trigger.kind !== 'schedule' && trigger.kind !== 'manual') {
    return skip(`dependency updates only run on schedule or manual triggers, not ${trigger.kind}`);
  }
  return run(`${trigger.kind} trigger`);
});
