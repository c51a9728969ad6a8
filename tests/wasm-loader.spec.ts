/**
 * Tests for WasmLoader in Node.js environment
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { WasmLoader } from '../src/wasm/WasmLoader.js';

describe('WasmLoader (Node.js)', () => {
  beforeEach(() => {
    WasmLoader.clearCache();
  });

  it('should load Ruby parser', async () => {
    const { parser, language } = await WasmLoader.loadParser('ruby');

    expect(parser).toBeDefined();
    expect(language).toBeDefined();

    const code = `class Greeter\n  def hello(name)\n    "Hello " + name\n  end\nend\n`;
    const tree = parser.parse(code);

    expect(tree).not.toBeNull();
    expect(tree?.rootNode.type).toBe('program');
    expect(tree?.rootNode.namedChildren[0]?.type).toBe('class');
    tree?.delete();
  });

  it('should cache parser instances', async () => {
    expect(WasmLoader.isCached('ruby')).toBe(false);

    await WasmLoader.loadParser('ruby');
    expect(WasmLoader.isCached('ruby')).toBe(true);

    // Loading again should return cached instance
    const { parser: parser1 } = await WasmLoader.loadParser('ruby');
    const { parser: parser2 } = await WasmLoader.loadParser('ruby');

    expect(parser1).toBe(parser2);
  });

  it('should clear cache', async () => {
    await WasmLoader.loadParser('ruby');
    expect(WasmLoader.isCached('ruby')).toBe(true);

    WasmLoader.clearCache();
    expect(WasmLoader.isCached('ruby')).toBe(false);
  });

  it('should cache by grammar path', async () => {
    await WasmLoader.loadParser('ruby');

    expect(WasmLoader.isCached('ruby', { environment: 'node', languageWasmUrl: '/elsewhere/ruby.wasm' })).toBe(false);
  });

  it('should reject when the configured grammar does not exist', async () => {
    await expect(
      WasmLoader.loadParser('ruby', { environment: 'node', languageWasmUrl: '/nonexistent/tree-sitter-ruby.wasm' })
    ).rejects.toThrow();
  });
});
