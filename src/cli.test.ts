import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseCliArgs } from './cli.js';
import { ConfigurationError } from './errors.js';

describe('parseCliArgs', () => {
  it('should show help without arguments', () => {
    assert.deepStrictEqual(parseCliArgs([]), { command: 'help' });
    assert.deepStrictEqual(parseCliArgs(['--help']), { command: 'help' });
  });

  it('should collect images and hash flags', () => {
    assert.deepStrictEqual(
      parseCliArgs(['hash', 'a.png', '--geometry', '7x7', '--reduce', 'b.jpg', '--method=median']),
      {
        command: 'hash',
        images: ['a.png', 'b.jpg'],
        config: { geometry: '7x7', reduce: true, method: 'median' },
        size: undefined,
      }
    );
  });

  it('should parse compare with a threshold and grid size', () => {
    assert.deepStrictEqual(
      parseCliArgs(['compare', 'a.png', 'b.png', '--mirrorproof', '--threshold', '6', '--size=64']),
      {
        command: 'compare',
        images: ['a.png', 'b.png'],
        config: { mirrorproof: true },
        size: 64,
        threshold: 6,
      }
    );
  });

  it('should read inline values of boolean switches', () => {
    assert.deepStrictEqual(
      parseCliArgs(['hash', 'a.png', '--reduce=false', '--mirror=no', '--mirrorproof=1']),
      {
        command: 'hash',
        images: ['a.png'],
        config: { reduce: false, mirror: false, mirrorproof: true },
        size: undefined,
      }
    );
    console.log('✅ Boolean switches honour inline values');
  });

  it('should default the compare threshold to 10', () => {
    const parsed = parseCliArgs(['compare', 'a.png', 'b.png', '--mirror']);
    assert.ok(parsed.command === 'compare');
    assert.strictEqual(parsed.threshold, 10);
  });

  it('should reject usage errors', () => {
    const invalid = [
      ['resize', 'a.png'],
      ['hash'],
      ['hash', 'a.png', '--threshold', '3'],
      ['compare', 'a.png'],
      ['compare', 'a.png', 'b.png', 'c.png'],
      ['hash', 'a.png', '--geometry'],
      ['hash', 'a.png', '--geometry', '--reduce'],
      ['hash', 'a.png', '--colour'],
      ['compare', 'a.png', 'b.png', '--threshold', 'near'],
      ['hash', 'a.png', '--reduce=sometimes'],
    ];
    for (const argv of invalid) {
      assert.throws(() => parseCliArgs(argv), ConfigurationError, argv.join(' '));
    }
  });
});
