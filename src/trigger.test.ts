/**
 * Unit tests for trigger context extraction
 */

import type * as github from '@actions/github';
import { branchFromRef, getTriggerContext, toTriggerKind } from './trigger';

describe('trigger', () => {
  describe('toTriggerKind', () => {
    it.each([
      ['push', 'push'],
      ['pull_request', 'pull_request'],
      ['pull_request_target', 'pull_request'],
      ['workflow_dispatch', 'manual'],
      ['schedule', 'schedule'],
      ['release', 'unknown'],
      ['toString', 'unknown'],
    ])('should map %s to %s', (eventName, kind) => {
      expect(toTriggerKind(eventName)).toBe(kind);
    });
  });

  describe('branchFromRef', () => {
    it('should strip the heads prefix', () => {
      expect(branchFromRef('refs/heads/main')).toBe('main');
      expect(branchFromRef('refs/heads/feature/x')).toBe('feature/x');
    });

    it('should leave other refs untouched', () => {
      expect(branchFromRef('refs/tags/v1.0.0')).toBe('refs/tags/v1.0.0');
    });
  });

  describe('getTriggerContext', () => {
    it('should build the context for a push', () => {
      const context = {
        eventName: 'push',
        ref: 'refs/heads/main',
        actor: 'alice',
        payload: {},
      } as typeof github.context;

      expect(getTriggerContext(context)).toEqual({
        kind: 'push',
        eventName: 'push',
        branch: 'main',
        actor: 'alice',
      });
    });

    it('should use the base branch and PR author for pull requests', () => {
      const context = {
        eventName: 'pull_request',
        ref: 'refs/pull/7/merge',
        actor: 'maintainer',
        payload: {
          pull_request: {
            number: 7,
            base: { ref: 'main' },
            user: { login: 'bob' },
          },
        },
      } as typeof github.context;

      expect(getTriggerContext(context)).toEqual({
        kind: 'pull_request',
        eventName: 'pull_request',
        branch: 'main',
        actor: 'bob',
      });
    });

    it('should fall back to the ref and actor when the payload is incomplete', () => {
      const context = {
        eventName: 'pull_request',
        ref: 'refs/pull/7/merge',
        actor: 'alice',
        payload: {},
      } as typeof github.context;

      const trigger = getTriggerContext(context);

      expect(trigger.branch).toBe('refs/pull/7/merge');
      expect(trigger.actor).toBe('alice');
    });

    it('should mark unhandled events as unknown', () => {
      const context = {
        eventName: 'issue_comment',
        ref: 'refs/heads/main',
        actor: 'alice',
        payload: {},
      } as typeof github.context;

      expect(getTriggerContext(context).kind).toBe('unknown');
    });
  });
});
