/**
 * Trigger context extraction from the GitHub event
 */

import type * as github from '@actions/github';
import type { TriggerContext, TriggerKind } from './types';

const EVENT_KINDS: Readonly<Record<string, TriggerKind>> = {
  push: 'push',
  pull_request: 'pull_request',
  pull_request_target: 'pull_request',
  workflow_dispatch: 'manual',
  schedule: 'schedule',
};

/**
 * Maps a GitHub event name to a trigger kind
 *
 * @param eventName - GitHub event name
 * @returns Trigger kind, or 'unknown' for events the pipeline does not handle
 */
export function toTriggerKind(eventName: string): TriggerKind {
  return Object.prototype.hasOwnProperty.call(EVENT_KINDS, eventName)
    ? EVENT_KINDS[eventName]
    : 'unknown';
}

/**
 * Strips the refs/heads/ prefix from a git ref
 */
export function branchFromRef(ref: string): string {
  return ref.startsWith('refs/heads/') ? ref.substring('refs/heads/'.length) : ref;
}

/**
 * Builds the trigger context from the GitHub context
 *
 * @param context - GitHub context
 * @returns Trigger context
 *
 * @remarks
 * For pull requests the branch is the base branch and the actor is the PR author,
 * so that an author restriction cannot be bypassed by someone else re-running the workflow.
 */
export function getTriggerContext(context: typeof github.context): TriggerContext {
  const kind = toTriggerKind(context.eventName);

  let branch = branchFromRef(context.ref ?? '');
  let actor = context.actor ?? '';

  if (kind === 'pull_request') {
    const pullRequest = context.payload.pull_request;
    const baseRef: unknown = pullRequest?.base?.ref;
    const author: unknown = pullRequest?.user?.login;

    if (typeof baseRef === 'string') {
      branch = baseRef;
    }
    if (typeof author === 'string') {
      actor = author;
    }
  }

  return Object.freeze({
    kind,
    eventName: context.eventName,
    branch,
    actor,
  });
}
