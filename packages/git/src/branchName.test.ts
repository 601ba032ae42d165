import { describe, expect, it } from 'vitest';
import {
  DEFAULT_BRANCH_TEMPLATE,
  generateBranchName,
  generateConfiguredBranchName,
  resolveBranchTemplate,
  type BranchNameContext,
} from './branchName.js';

const baseContext: BranchNameContext = {
  runId: 'Run_42',
  workflowName: 'fix_tests',
  baseBranch: 'release/2.0',
};

const fixedNow = () => new Date('2026-02-15T08:30:00.000Z');

describe('branch template helpers', () => {
  it('uses the default template when no explicit or env template is set', () => {
    expect(resolveBranchTemplate(undefined, {})).toBe(DEFAULT_BRANCH_TEMPLATE);
  });

  it('uses RUNWRIGHT_BRANCH_TEMPLATE when no explicit template is provided', () => {
    expect(resolveBranchTemplate(null, { RUNWRIGHT_BRANCH_TEMPLATE: ' custom/{run-id} ' })).toBe('custom/{run-id}');
  });

  it('prioritizes explicit template over the environment', () => {
    expect(resolveBranchTemplate('explicit/{run-id}', { RUNWRIGHT_BRANCH_TEMPLATE: 'env/{run-id}' })).toBe(
      'explicit/{run-id}',
    );
  });

  it('expands all documented tokens', () => {
    const branch = generateBranchName(
      'agents/{workflow}/{base-branch}/{run-id}/{short-hash}/{date}',
      baseContext,
      { now: fixedNow, randomHex: () => 'a1b2c3' },
    );

    expect(branch).toBe('agents/fix-tests/release-2.0/run-42/a1b2c3/2026-02-15');
  });

  it('appends the run id when the template omits it', () => {
    const branch = generateBranchName('agents/{workflow}', baseContext, { now: fixedNow });

    expect(branch).toBe('agents/fix-tests/run-42');
  });

  it('treats missing optional tokens as empty and normalizes separators', () => {
    const branch = generateBranchName('runwright/{workflow}-{base-branch}/{run-id}', { runId: '7' });

    expect(branch).toBe('runwright/7');
  });

  it('sanitizes git-disallowed characters and invalid suffixes', () => {
    const branch = generateBranchName('runwright/ bad name /te..st~^:\\\\\\control.lock./{run-id}', {
      runId: '1',
    });

    expect(branch).toBe('runwright/bad-name/te.st-control/1');
  });

  it('drops dot edges, reflog syntax and repeated lock suffixes', () => {
    const branch = generateBranchName('runwright/.hidden/x@{y}/a.lock.lock/{run-id}', { runId: 'r' });

    expect(branch).toBe('runwright/hidden/x-y}/a/r');
  });

  it('falls back to a fixed name when nothing usable remains', () => {
    expect(generateBranchName('///', { runId: '***' })).toBe('runwright/branch');
  });

  it('generates configured names with the default template', () => {
    expect(generateConfiguredBranchName(baseContext, undefined, { environment: {} })).toBe(
      'runwright/fix-tests/run-42',
    );
  });
});
