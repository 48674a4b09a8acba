import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConstraintResolver } from '../../../src/core/resolution/constraint-resolver.js';
import { ConstraintResolutionError } from '../../../src/utils/errors.js';
import { CapturingLogger, FakeRemote, tag, type FakeRepo } from '../../test-helpers.js';

function resolverFor(repo: FakeRepo, includePrereleases = false) {
  const remote = new FakeRemote({ 'org/test-formula': repo });
  const resolver = new ConstraintResolver({ remote, logger: new CapturingLogger(), includePrereleases });
  return { remote, resolver };
}

describe('ConstraintResolver', () => {
  const releases = { tags: [tag('v1.0.1', 'sha-101'), tag('v2.0.1', 'sha-201')] };

  it('should pick the highest tag for a lower bound', async () => {
    const { resolver } = resolverFor(releases);
    assert.deepStrictEqual(
      await resolver.resolveConstraintToObject('org', 'test-formula', '>=v1.1'),
      { name: 'v2.0.1', commitSha: 'sha-201', kind: 'tag' }
    );
  });

  it('should pick the highest tag under an upper bound', async () => {
    const { resolver } = resolverFor(releases);
    assert.deepStrictEqual(
      await resolver.resolveConstraintToObject('org', 'test-formula', '<=v1.1'),
      { name: 'v1.0.1', commitSha: 'sha-101', kind: 'tag' }
    );
  });

  it('should find an exact version', async () => {
    const { resolver } = resolverFor(releases);
    const revision = await resolver.resolveConstraintToObject('org', 'test-formula', '==v2.0.1');
    assert.strictEqual(revision?.commitSha, 'sha-201');
  });

  it('should fail an exact version that is not tagged', async () => {
    const { resolver } = resolverFor(releases);
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '==v6.6.6'), ConstraintResolutionError);
  });

  it('should fail a lower bound above every tag', async () => {
    const { resolver } = resolverFor(releases);
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '>=v2.1'), ConstraintResolutionError);
  });

  it('should fail an upper bound below every tag', async () => {
    const { resolver } = resolverFor(releases);
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '<=v1.0'), ConstraintResolutionError);
  });

  it('should skip prereleases for a lower bound', async () => {
    const { resolver } = resolverFor({ tags: [tag('v1.0.0', 'sha-100'), tag('v1.1.0-rc.1', 'sha-rc')] });
    const revision = await resolver.resolveConstraintToObject('org', 'test-formula', '>=v1.0');
    assert.strictEqual(revision?.name, 'v1.0.0');
  });

  it('should accept prereleases when asked', async () => {
    const { resolver } = resolverFor({ tags: [tag('v1.0.0', 'sha-100'), tag('v1.1.0-rc.1', 'sha-rc')] }, true);
    const revision = await resolver.resolveConstraintToObject('org', 'test-formula', '>=v1.0');
    assert.strictEqual(revision?.name, 'v1.1.0-rc.1');
  });

  it('should stop at the first candidate below a lower bound', async () => {
    const { resolver } = resolverFor({ tags: [tag('v1.0.0', 'sha-100'), tag('v2.0.0-rc.1', 'sha-rc')] });
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '>=v1.5'), ConstraintResolutionError);
  });

  it('should select an exact prerelease', async () => {
    const { resolver } = resolverFor({ tags: [tag('v1.0.0', 'sha-100'), tag('v1.1.0-rc.1', 'sha-rc')] });
    const revision = await resolver.resolveConstraintToObject('org', 'test-formula', '==v1.1.0-rc.1');
    assert.strictEqual(revision?.commitSha, 'sha-rc');
  });

  it('should take the latest release when unconstrained', async () => {
    const { resolver } = resolverFor({
      tags: [tag('v1.0.0', 'sha-100'), tag('v1.1.0-beta', 'sha-beta'), tag('latest', 'sha-latest')]
    });
    const revision = await resolver.resolveConstraintToObject('org', 'test-formula', '');
    assert.deepStrictEqual(revision, { name: 'v1.0.0', commitSha: 'sha-100', kind: 'tag' });
  });

  it('should return null when unconstrained and there is no release', async () => {
    const { resolver } = resolverFor({ tags: [] });
    assert.strictEqual(await resolver.resolveConstraintToObject('org', 'test-formula', ''), null);
  });

  it('should fall back to the default branch in resolveRevision', async () => {
    const { resolver } = resolverFor({ tags: [], branches: { master: 'sha-master' } });
    assert.deepStrictEqual(
      await resolver.resolveRevision('org', 'test-formula', ''),
      { name: 'master', commitSha: 'sha-master', kind: 'branch' }
    );
  });

  it('should fail resolveRevision when the default branch is missing too', async () => {
    const { resolver } = resolverFor({ tags: [] });
    await assert.rejects(resolver.resolveRevision('org', 'test-formula', ''), ConstraintResolutionError);
  });

  it('should resolve a branch without listing tags', async () => {
    const { remote, resolver } = resolverFor({ tags: releases.tags, branches: { develop: 'sha-dev' } });
    assert.deepStrictEqual(
      await resolver.resolveConstraintToObject('org', 'test-formula', '==develop'),
      { name: 'develop', commitSha: 'sha-dev', kind: 'branch' }
    );
    assert.strictEqual(remote.callCount('listTags', 'org/test-formula'), 0);
  });

  it('should resolve a pinned commit sha', async () => {
    const { resolver } = resolverFor({ commits: ['abc1234'] });
    assert.deepStrictEqual(
      await resolver.resolveConstraintToObject('org', 'test-formula', '==abc1234'),
      { name: 'abc1234', commitSha: 'abc1234', kind: 'commit' }
    );
  });

  it('should fail a missing branch', async () => {
    const { resolver } = resolverFor({ branches: {} });
    await assert.rejects(
      resolver.resolveConstraintToObject('org', 'test-formula', '==no-such-branch'),
      ConstraintResolutionError
    );
  });

  it('should fail an unknown comparator', async () => {
    const { resolver } = resolverFor(releases);
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '=>v1.0'), ConstraintResolutionError);
  });

  it('should fail a version constraint on a repository without version tags', async () => {
    const { resolver } = resolverFor({ tags: [tag('latest', 'sha-latest')] });
    await assert.rejects(resolver.resolveConstraintToObject('org', 'test-formula', '>=v1.0'), ConstraintResolutionError);
  });
});
