/**
 * Unit tests for job gates
 */

import * as core from '@actions/core';
import { resolveConfiguration } from './config';
import { dependencyUpdateGate, docsGate, lintGate, securityGate } from './gates';
import type {
  GateContext,
  JobName,
  JobResult,
  PartialRunConfiguration,
  ResultStatus,
  TriggerContext,
  TriggerKind,
} from './types';

jest.mock('@actions/core');

function trigger(kind: TriggerKind, branch = 'main', actor = 'alice'): TriggerContext {
  const eventNames: Record<TriggerKind, string> = {
    push: 'push',
    pull_request: 'pull_request',
    manual: 'workflow_dispatch',
    schedule: 'schedule',
    unknown: 'release',
  };
  return { kind, eventName: eventNames[kind], branch, actor };
}

function context(
  partial: PartialRunConfiguration,
  triggerContext: TriggerContext,
  lintStatus?: ResultStatus
): GateContext {
  const results = new Map<JobName, JobResult>();
  if (lintStatus) {
    results.set('lint', { name: 'lint', status: lintStatus, steps: [] });
  }
  return { config: resolveConfiguration(partial), trigger: triggerContext, results };
}

describe('gates', () => {
  const mockCore = core as jest.Mocked<typeof core>;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('lintGate', () => {
    it.each<TriggerKind>(['push', 'pull_request', 'manual', 'schedule'])(
      'should run on %s when no PR author restriction is set',
      (kind) => {
        expect(lintGate(context({}, trigger(kind, 'main', 'bob'))).run).toBe(true);
      }
    );

    it('should skip pull requests from an actor other than the allowed author', () => {
      const decision = lintGate(
        context({ allowedPrAuthor: 'alice' }, trigger('pull_request', 'main', 'bob'))
      );

      expect(decision).toEqual({ run: false, reason: 'pull request author bob is not alice' });
    });

    it('should run pull requests from the allowed author', () => {
      expect(
        lintGate(context({ allowedPrAuthor: 'alice' }, trigger('pull_request', 'main', 'alice'))).run
      ).toBe(true);
    });

    it('should ignore the author restriction for pushes', () => {
      expect(
        lintGate(context({ allowedPrAuthor: 'alice' }, trigger('push', 'main', 'bob'))).run
      ).toBe(true);
    });

    it('should fail closed on an unrecognized trigger', () => {
      const decision = lintGate(context({}, trigger('unknown')));

      expect(decision).toEqual({ run: false, reason: 'Unrecognized trigger event: release' });
      expect(mockCore.warning).toHaveBeenCalledWith(
        'Unrecognized trigger event: release; skipping job'
      );
    });
  });

  describe('securityGate', () => {
    it.each([
      [true, true, true],
      [true, false, false],
      [false, true, false],
      [false, false, false],
    ])('enableSecurityScan=%s and lint gate=%s should run=%s', (enabled, lintOpen, expected) => {
      const actor = lintOpen ? 'alice' : 'bob';
      const decision = securityGate(
        context(
          { enableSecurityScan: enabled, allowedPrAuthor: 'alice' },
          trigger('pull_request', 'main', actor)
        )
      );

      expect(decision.run).toBe(expected);
    });

    it('should report the lint gate reason when lint is skipped', () => {
      const decision = securityGate(
        context(
          { enableSecurityScan: true, allowedPrAuthor: 'alice' },
          trigger('pull_request', 'main', 'bob')
        )
      );

      expect(decision.reason).toBe('pull request author bob is not alice');
    });

    it('should fail closed on an unrecognized trigger', () => {
      expect(securityGate(context({ enableSecurityScan: true }, trigger('unknown'))).run).toBe(false);
    });
  });

  describe('docsGate', () => {
    it('should run on a push to main with docs enabled and lint succeeded', () => {
      const decision = docsGate(context({ enableDocs: true }, trigger('push'), 'succeeded'));

      expect(decision).toEqual({ run: true, reason: 'push to main with passing lint' });
    });

    it('should skip when docs are disabled', () => {
      expect(docsGate(context({ enableDocs: false }, trigger('push'), 'succeeded'))).toEqual({
        run: false,
        reason: 'docs generation disabled',
      });
    });

    it('should skip pushes to other branches', () => {
      expect(
        docsGate(context({ enableDocs: true }, trigger('push', 'feature'), 'succeeded'))
      ).toEqual({ run: false, reason: 'docs only run on main, not feature' });
    });

    it('should skip pull requests', () => {
      expect(
        docsGate(context({ enableDocs: true }, trigger('pull_request'), 'succeeded'))
      ).toEqual({ run: false, reason: 'docs only run on push, not pull_request' });
    });

    it.each<ResultStatus>(['failed', 'skipped', 'cancelled'])(
      'should skip when the lint job is %s',
      (status) => {
        expect(docsGate(context({ enableDocs: true }, trigger('push'), status))).toEqual({
          run: false,
          reason: `lint job is ${status}`,
        });
      }
    );

    it('should skip while the lint job has not finished', () => {
      expect(docsGate(context({ enableDocs: true }, trigger('push'))).reason).toBe(
        'lint job is pending'
      );
    });

    it('should follow a configured main branch', () => {
      expect(
        docsGate(
          context({ enableDocs: true, mainBranch: 'trunk' }, trigger('push', 'trunk'), 'succeeded')
        ).run
      ).toBe(true);
    });
  });

  describe('dependencyUpdateGate', () => {
    it.each<TriggerKind>(['schedule', 'manual'])('should run on %s triggers', (kind) => {
      expect(dependencyUpdateGate(context({ enableDependencyUpdates: true }, trigger(kind))).run).toBe(
        true
      );
    });

    it.each<TriggerKind>(['push', 'pull_request', 'unknown'])('should skip %s triggers', (kind) => {
      expect(dependencyUpdateGate(context({ enableDependencyUpdates: true }, trigger(kind))).run).toBe(
        false
      );
    });

    it('should skip when dependency updates are disabled', () => {
      expect(dependencyUpdateGate(context({}, trigger('schedule')))).toEqual({
        run: false,
        reason: 'dependency updates disabled',
      });
    });
  });
});
