/**
 * Tests for AncestorResolver and its resolution strategies
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AncestorResolver } from '../src/ancestor-resolution/AncestorResolver.js';
import { constantToRelativePath, isTestPath } from '../src/ancestor-resolution/path-utils.js';
import type { AncestorResolutionStrategy } from '../src/ancestor-resolution/types.js';
import { RubySourceParser } from '../src/ruby/RubySourceParser.js';
import { FileAnalyzer } from '../src/signal-collection/FileAnalyzer.js';
import { DEFAULT_DETECTION_RULES } from '../src/signal-detection/constants.js';
import type { FileStructure } from '../src/signal-detection/types.js';

const parser = new RubySourceParser();

describe('AncestorResolver', () => {
  let repoRoot: string;
  let analyzer: FileAnalyzer;
  let resolver: AncestorResolver;

  async function writeRuby(relativePath: string, source: string): Promise<string> {
    const filePath = path.join(repoRoot, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, source);
    return filePath;
  }

  async function structureOf(filePath: string): Promise<FileStructure> {
    const structure = await analyzer.getStructure(filePath);
    if (!structure) throw new Error(`No structure for ${filePath}`);
    return structure;
  }

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'ancestors-'));
    analyzer = new FileAnalyzer(parser, DEFAULT_DETECTION_RULES);
    resolver = AncestorResolver.forRepository(repoRoot, analyzer);
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it('should resolve a superclass next to the child', async () => {
    const child = await writeRuby('app/models/child.rb', 'class Child < Parent\nend\n');
    await writeRuby('app/models/parent.rb', 'class Parent\nend\n');

    const ancestors = await resolver.collectAncestors(await structureOf(child), child);

    expect(ancestors).toEqual([
      { name: 'Parent', file: path.join(repoRoot, 'app/models/parent.rb'), depth: 1, kind: 'class' },
    ]);
  });

  it('should resolve namespaced names by convention under app/ and lib/', async () => {
    const controller = await writeRuby(
      'app/controllers/users_controller.rb',
      'class UsersController < Admin::BaseController\nend\n'
    );
    await writeRuby('lib/admin/base_controller.rb', 'module Admin\n  class BaseController\n  end\nend\n');

    expect(await resolver.resolve('Admin::BaseController', controller)).toBe(
      path.join(repoRoot, 'lib/admin/base_controller.rb')
    );
  });

  it('should walk superclasses, then includes, then prepends, but never extends', async () => {
    const child = await writeRuby(
      'app/models/child.rb',
      'class Child < Base\n  prepend Audited\n  include Tracked\n  extend Findable\nend\n'
    );
    await writeRuby('app/models/base.rb', 'class Base\nend\n');
    await writeRuby('app/models/audited.rb', 'module Audited\nend\n');
    await writeRuby('app/models/tracked.rb', 'module Tracked\nend\n');
    await writeRuby('app/models/findable.rb', 'module Findable\nend\n');

    const ancestors = await resolver.collectAncestors(await structureOf(child), child);

    expect(ancestors.map(a => [a.name, a.kind, a.depth])).toEqual([
      ['Base', 'class', 1],
      ['Tracked', 'module', 1],
      ['Audited', 'module', 1],
    ]);
  });

  it('should terminate on mutually including modules', async () => {
    const user = await writeRuby('app/models/user.rb', 'class User\n  include Alpha\nend\n');
    await writeRuby('lib/alpha.rb', 'module Alpha\n  include Beta\nend\n');
    await writeRuby('lib/beta.rb', 'module Beta\n  include Alpha\nend\n');

    const ancestors = await resolver.collectAncestors(await structureOf(user), user);

    expect(ancestors).toEqual([
      { name: 'Alpha', file: path.join(repoRoot, 'lib/alpha.rb'), depth: 1, kind: 'module' },
      { name: 'Beta', file: path.join(repoRoot, 'lib/beta.rb'), depth: 2, kind: 'module' },
    ]);
  });

  it('should stop at five generations', async () => {
    for (let i = 0; i < 7; i++) {
      const parent = i < 6 ? ` < C${i + 1}` : '';
      await writeRuby(`app/models/c${i}.rb`, `class C${i}${parent}\nend\n`);
    }
    const start = path.join(repoRoot, 'app/models/c0.rb');

    const ancestors = await resolver.collectAncestors(await structureOf(start), start);

    expect(ancestors.map(a => [a.name, a.depth])).toEqual([
      ['C1', 1],
      ['C2', 2],
      ['C3', 3],
      ['C4', 4],
      ['C5', 5],
    ]);
  });

  it('should ignore definitions in test files and directories', async () => {
    const child = await writeRuby('app/models/child.rb', 'class Child < Parent\nend\n');
    await writeRuby('lib/test/parent.rb', 'class Parent\nend\n');
    await writeRuby('app/models/parent_spec.rb', 'class Parent\nend\n');

    expect(await resolver.resolve('Parent', child)).toBeNull();
    expect(await resolver.collectAncestors(await structureOf(child), child)).toEqual([]);
  });

  it('should fall back to a text search for class and module definitions', async () => {
    const child = await writeRuby('app/models/child.rb', 'class Child < LegacyBase\n  include Trackable\nend\n');
    await writeRuby('lib/odd/place.rb', 'module Odd\n  class LegacyBase\n  end\nend\n');
    await writeRuby('lib/tracking.rb', 'module Trackable\nend\n');

    expect(await resolver.resolve('LegacyBase', child)).toBe(path.join(repoRoot, 'lib/odd/place.rb'));
    expect(await resolver.resolve('Trackable', child)).toBe(path.join(repoRoot, 'lib/tracking.rb'));
  });

  it('should memoize resolutions, misses included', async () => {
    let calls = 0;
    const counting: AncestorResolutionStrategy = {
      name: 'counting',
      resolve: async () => {
        calls++;
        return null;
      },
    };
    const memoized = new AncestorResolver(analyzer, [counting]);

    expect(await memoized.resolve('Missing', 'a.rb')).toBeNull();
    expect(await memoized.resolve('Missing', 'b.rb')).toBeNull();
    expect(calls).toBe(1);
  });

  it('should skip resolutions pointing at files that do not exist', async () => {
    const child = await writeRuby('app/models/child.rb', 'class Child < Ghost\nend\n');
    const stale = new AncestorResolver(analyzer, [
      { name: 'stale', resolve: async () => path.join(repoRoot, 'app/models/ghost.rb') },
    ]);

    expect(await stale.collectAncestors(await structureOf(child), child)).toEqual([]);
  });
});

describe('path utils', () => {
  it('should map constants to snake_case paths', () => {
    expect(constantToRelativePath('PaymentService')).toBe('payment_service');
    expect(constantToRelativePath('Admin::BaseController')).toBe('admin/base_controller');
    expect(constantToRelativePath('HTTPClient')).toBe('http_client');
    expect(constantToRelativePath('::Api::V2Handler')).toBe('api/v2_handler');
  });

  it('should recognize test files relative to the repository root', () => {
    expect(isTestPath('/repo/spec/models/user.rb', '/repo')).toBe(true);
    expect(isTestPath('/repo/app/models/user_test.rb', '/repo')).toBe(true);
    expect(isTestPath('/repo/app/models/user_spec.rb', '/repo')).toBe(true);
    expect(isTestPath('/repo/app/models/contest.rb', '/repo')).toBe(false);
    expect(isTestPath('/repo/app/test_helpers/user.rb', '/repo')).toBe(false);
    expect(isTestPath('/home/test/repo/app/models/user.rb', '/home/test/repo')).toBe(false);
  });
});
