/**
 * @fileoverview Unit tests for the descriptor parser
 */

import { parseDescriptor } from '../../../src';

describe('parseDescriptor', () => {
  it('should read name = type bindings and trim both sides', () => {
    const { entries, malformed } = parseDescriptor('  foo = pkg.FooImpl  \nbar=pkg.BarImpl');

    expect(entries).toEqual([
      { name: 'foo', typeReference: 'pkg.FooImpl', line: 1 },
      { name: 'bar', typeReference: 'pkg.BarImpl', line: 2 },
    ]);
    expect(malformed).toEqual([]);
  });

  it('should strip comments and skip blank lines', () => {
    const text = '# language plugins\n\nbar=pkg.BarImpl # fallback\n   \n# foo=pkg.FooImpl\n';

    const { entries } = parseDescriptor(text);

    expect(entries).toEqual([{ name: 'bar', typeReference: 'pkg.BarImpl', line: 3 }]);
  });

  it('should bind a line without "=" under its own type reference', () => {
    const { entries } = parseDescriptor('pkg.GoImpl   # no explicit name');

    expect(entries).toEqual([{ name: 'pkg.GoImpl', typeReference: 'pkg.GoImpl', line: 1 }]);
  });

  it('should split on the first "=" only', () => {
    const { entries } = parseDescriptor('a = b=c');

    expect(entries).toEqual([{ name: 'a', typeReference: 'b=c', line: 1 }]);
  });

  it('should report lines with an empty name or type reference', () => {
    const { entries, malformed } = parseDescriptor('=pkg.FooImpl\nfoo=  # nothing\nok=pkg.Ok');

    expect(malformed).toEqual([
      { line: 1, text: '=pkg.FooImpl', reason: 'missing extension name' },
      { line: 2, text: 'foo=  # nothing', reason: 'missing type reference' },
    ]);
    expect(entries).toEqual([{ name: 'ok', typeReference: 'pkg.Ok', line: 3 }]);
  });

  it('should accept CRLF line endings', () => {
    const { entries } = parseDescriptor('a=pkg.A\r\nb=pkg.B\r\n');

    expect(entries.map((entry) => entry.name)).toEqual(['a', 'b']);
    expect(entries[1].typeReference).toBe('pkg.B');
  });

  it('should return nothing for an empty descriptor', () => {
    expect(parseDescriptor('')).toEqual({ entries: [], malformed: [] });
  });
});
