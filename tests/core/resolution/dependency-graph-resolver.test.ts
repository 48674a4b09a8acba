import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { writeFile } from 'node:fs/promises';

import { DependencyGraphResolver } from '../../../src/core/resolution/dependency-graph-resolver.js';
import {
  ConfigError,
  ConstraintFormatError,
  ConstraintResolutionError,
  RemoteConnectionError
} from '../../../src/utils/errors.js';
import {
  CapturingLogger,
  FakeRemote,
  makeTempDir,
  removeTempDir,
  tag,
  type FakeRepo
} from '../../test-helpers.js';

const A = 'git@github.com:test-org/a-formula.git';
const B = 'git@github.com:test-org/b-formula.git';
const C = 'git@github.com:test-org/c-formula.git';
const ROOT = 'git@github.com:test-org/root-formula.git';

const ROOT_MANIFEST = [
  'formula: test-org/root-formula',
  'dependencies:',
  `  - ${A}`,
  `  - ${C}==v1.0.0`,
  ''
].join('\n');

function manifest(...dependencies: string[]): string {
  return `dependencies:\n${dependencies.map(dependency => `  - ${dependency}\n`).join('')}`;
}

/**
 * a depends on b and c; b depends back on a and on the root formula.
 */
function graphRepos(): Record<string, FakeRepo> {
  return {
    'test-org/a-formula': {
      tags: [tag('v1.0.0', 'sha-a1'), tag('v1.1.0', 'sha-a2')],
      files: { 'sha-a2': { 'metadata.yml': manifest(`${B}>=v1.0.0`, `${C}==v1.0.0`) } }
    },
    'test-org/b-formula': {
      tags: [tag('v1.0.0', 'sha-b1'), tag('v2.0.0', 'sha-b2')],
      files: { 'sha-b2': { 'metadata.yml': manifest(A, ROOT) } }
    },
    'test-org/c-formula': {
      tags: [tag('v1.0.0', 'sha-c1')]
    }
  };
}

describe('DependencyGraphResolver', () => {
  let rootDir: string;
  let logger: CapturingLogger;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    logger = new CapturingLogger();
    await writeFile(path.join(rootDir, 'metadata.yml'), ROOT_MANIFEST);
  });

  afterEach(async () => {
    await removeTempDir(rootDir);
  });

  async function writeRoot(...dependencies: string[]): Promise<void> {
    await writeFile(path.join(rootDir, 'metadata.yml'), `formula: test-org/root-formula\n${manifest(...dependencies)}`);
  }

  function resolverFor(remote: FakeRemote): DependencyGraphResolver {
    return new DependencyGraphResolver({ rootDir, remote, logger });
  }

  it('should resolve the transitive closure without the root formula', async () => {
    const remote = new FakeRemote(graphRepos());
    const resolver = resolverFor(remote);

    const graph = await resolver.updateDependencies();

    assert.deepStrictEqual(graph.root, { organisation: 'test-org', name: 'root-formula' });
    assert.deepStrictEqual(resolver.getRootMetadata()?.key, graph.root);
    assert.deepStrictEqual([...graph.dependencies.keys()].sort(), [
      'test-org/a-formula',
      'test-org/b-formula',
      'test-org/c-formula'
    ]);
    assert.deepStrictEqual(resolver.getRequirementsLines(), [
      `${A}==v1.1.0`,
      `${B}==v2.0.0`,
      `${C}==v1.0.0`
    ]);
  });

  it('should fetch a package shared by two parents once', async () => {
    await writeRoot(A, B);
    const remote = new FakeRemote({
      'test-org/a-formula': {
        tags: [tag('v1.0.0', 'sha-a1')],
        files: { 'sha-a1': { 'metadata.yml': manifest(`${C}==v1.0.0`) } }
      },
      'test-org/b-formula': {
        tags: [tag('v1.0.0', 'sha-b1')],
        files: { 'sha-b1': { 'metadata.yml': manifest(`${C}==v1.0.0`) } }
      },
      'test-org/c-formula': { tags: [tag('v1.0.0', 'sha-c1')] }
    });
    const resolver = resolverFor(remote);

    await resolver.updateDependencies();

    // requirements file, then manifest
    assert.strictEqual(remote.callCount('fetchFile', 'test-org/c-formula'), 2);
    assert.strictEqual(remote.callCount('listTags', 'test-org/c-formula'), 1);
    assert.deepStrictEqual(resolver.getDependencies().get('test-org/c-formula')?.sourcedConstraints, ['==v1.0.0']);
  });

  it('should walk a package again when a tighter constraint reaches it', async () => {
    await writeRoot(`${C}>=v1.0.0`, A);
    const remote = new FakeRemote({
      'test-org/a-formula': {
        tags: [tag('v1.0.0', 'sha-a1')],
        files: { 'sha-a1': { 'metadata.yml': manifest(`${C}==v1.0.0`) } }
      },
      'test-org/c-formula': { tags: [tag('v1.0.0', 'sha-c1'), tag('v1.1.0', 'sha-c2')] }
    });
    const resolver = resolverFor(remote);

    await resolver.updateDependencies();

    assert.strictEqual(remote.callCount('fetchFile', 'test-org/c-formula'), 4);
    const record = resolver.getDependencies().get('test-org/c-formula');
    assert.strictEqual(record?.constraint, '==v1.0.0');
    assert.deepStrictEqual(record?.sourcedConstraints, ['>=v1.0.0', '==v1.0.0']);
    assert.deepStrictEqual(resolver.getRequirementsLines(), [`${A}==v1.0.0`, `${C}==v1.0.0`]);
  });

  it('should keep the tightest upper bound across partial versions', async () => {
    await writeRoot(A, `${C}<=v1.9`);
    const remote = new FakeRemote({
      'test-org/a-formula': {
        tags: [tag('v1.0.0', 'sha-a1')],
        files: { 'sha-a1': { 'metadata.yml': manifest(`${C}<=v1.10`) } }
      },
      'test-org/c-formula': {
        tags: [tag('v1.9.0', 'sha-c9'), tag('v1.10.0', 'sha-c10'), tag('v1.11.0', 'sha-c11')]
      }
    });
    const resolver = resolverFor(remote);

    await resolver.updateDependencies();

    assert.strictEqual(resolver.getDependencies().get('test-org/c-formula')?.constraint, '<=v1.9');
    assert.deepStrictEqual(resolver.getRequirementsLines(), [`${A}==v1.0.0`, `${C}==v1.9.0`]);
  });

  it('should reject a dependency entry whose constraint has no comparator', async () => {
    await writeRoot(A);
    const remote = new FakeRemote({
      'test-org/a-formula': {
        tags: [tag('v1.0.0', 'sha-a1')],
        files: { 'sha-a1': { 'metadata.yml': manifest(`${B}v1.0.0`) } }
      },
      'test-org/b-formula': { tags: [tag('v1.0.0', 'sha-b1'), tag('v2.0.0', 'sha-b2')] }
    });

    await assert.rejects(() => resolverFor(remote).updateDependencies(), ConstraintFormatError);
  });

  it('should pin every resolved dependency to a commit', async () => {
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    await resolver.updateDependencies();

    assert.deepStrictEqual(resolver.getResolvedDependencies().get('test-org/b-formula'), {
      key: 'test-org/b-formula',
      organisation: 'test-org',
      name: 'b-formula',
      source: B,
      sha: 'sha-b2',
      tag: 'v2.0.0'
    });
  });

  it('should give the same result when run twice', async () => {
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    await resolver.updateDependencies();
    const first = resolver.getRequirementsLines();
    await resolver.updateDependencies();
    assert.deepStrictEqual(resolver.getRequirementsLines(), first);
  });

  it('should refuse to run without credentials', async () => {
    const remote = new FakeRemote(graphRepos(), false);
    await assert.rejects(() => resolverFor(remote).updateDependencies(), RemoteConnectionError);
    assert.strictEqual(remote.callCount('listTags', 'test-org/a-formula'), 0);
  });

  it('should raise a configuration error when the manifest is missing', async () => {
    const emptyDir = await makeTempDir();
    try {
      const resolver = new DependencyGraphResolver({ rootDir: emptyDir, remote: new FakeRemote({}), logger });
      await assert.rejects(() => resolver.loadLocalMetadata(), ConfigError);
    } finally {
      await removeTempDir(emptyDir);
    }
  });

  it('should seed from the requirements file unless told to ignore it', async () => {
    await writeFile(path.join(rootDir, 'formula-requirements.txt'), `# pinned\n${A}==v1.0.0\n`);
    const resolver = resolverFor(new FakeRemote(graphRepos()));

    assert.strictEqual(await resolver.loadLocalRequirements(), true);
    await resolver.updateDependencies();
    assert.deepStrictEqual(resolver.getRequirementsLines(), [`${A}==v1.0.0`]);

    await resolver.updateDependencies({ ignoreLocalRequirements: true });
    assert.deepStrictEqual(resolver.getRequirementsLines(), [
      `${A}==v1.1.0`,
      `${B}==v2.0.0`,
      `${C}==v1.0.0`
    ]);
  });

  it('should report a missing requirements file', async () => {
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    assert.strictEqual(await resolver.loadLocalRequirements(), false);
  });

  it('should trust pinned requirements fetched from a dependency', async () => {
    const repos = graphRepos();
    repos['test-org/a-formula'].files = {
      'sha-a2': {
        'formula-requirements.txt': `${B}==v1.0.0\n`,
        'metadata.yml': manifest(`${B}>=v1.0.0`)
      }
    };
    const remote = new FakeRemote(repos);
    const resolver = resolverFor(remote);

    await resolver.updateDependencies();

    assert.deepStrictEqual(resolver.getRequirementsLines(), [
      `${A}==v1.1.0`,
      `${B}==v1.0.0`,
      `${C}==v1.0.0`
    ]);
    assert.strictEqual(remote.callCount('fetchFile', 'test-org/b-formula'), 0);
  });

  it('should read manifests only when dependency requirements are ignored', async () => {
    const repos = graphRepos();
    repos['test-org/a-formula'].files = {
      'sha-a2': {
        'formula-requirements.txt': `${B}==v1.0.0\n`,
        'metadata.yml': manifest(`${B}>=v1.0.0`)
      }
    };
    const resolver = resolverFor(new FakeRemote(repos));

    await resolver.updateDependencies({ ignoreDependencyRequirements: true });

    assert.deepStrictEqual(resolver.getRequirementsLines(), [
      `${A}==v1.1.0`,
      `${B}==v2.0.0`,
      `${C}==v1.0.0`
    ]);
  });

  it('should fail on contradictory bounds', async () => {
    await writeFile(
      path.join(rootDir, 'metadata.yml'),
      `formula: test-org/root-formula\ndependencies:\n  - ${A}\n  - ${B}<=v2.0.0\n`
    );
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    await assert.rejects(() => resolver.updateDependencies(), ConstraintResolutionError);
  });

  it('should list checkouts that are no longer needed', async () => {
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    await resolver.updateDependencies();

    assert.deepStrictEqual(
      resolver.getOrphanedDirectories(['old-formula', 'a-formula', 'b-formula', 'c-formula', 'another-formula']),
      ['another-formula', 'old-formula']
    );
  });

  it('should refuse to report results before resolving', () => {
    const resolver = resolverFor(new FakeRemote(graphRepos()));
    assert.throws(() => resolver.getResolvedDependencies(), /have not been resolved/);
  });
});
