/**
 * Tests for positioning and applying patch chunks.
 */

import { describe, expect, it } from '@jest/globals';

import { applyChunkAt, applyChunks, findChunkPosition, matchLines } from '../patch-applier.js';
import { emptyChunk, type PatchChunk } from '../patch-parser.js';

function chunk(overrides: Partial<PatchChunk>): PatchChunk {
  return { ...emptyChunk(), ...overrides };
}

describe('matchLines', () => {
  it('should compare lines at the requested strictness', () => {
    const lines = ['a', 'b  ', '  c'];

    expect(matchLines(lines, ['b'], 'exact')).toBe(-1);
    expect(matchLines(lines, ['b'], 'rstrip')).toBe(1);
    expect(matchLines(lines, ['b', 'c'], 'rstrip')).toBe(-1);
    expect(matchLines(lines, ['b', 'c'], 'strip')).toBe(1);
  });

  it('should match an empty block at 0 and never match an oversized one', () => {
    expect(matchLines(['a'], [], 'exact')).toBe(0);
    expect(matchLines(['a'], ['a', 'b'], 'exact')).toBe(-1);
  });

  it('should start searching at the given index', () => {
    const lines = ['x', 'y', 'x', 'z'];

    expect(matchLines(lines, ['x'], 'exact', 1)).toBe(2);
    expect(matchLines(lines, ['x'], 'exact', 3)).toBe(-1);
  });
});

describe('findChunkPosition', () => {
  const lines = ['function foo() {', '  x', '}'];

  it('should position after the context block', () => {
    expect(findChunkPosition(lines, chunk({ context: ['function foo() {'] }))).toBe(1);
  });

  it('should skip context occurrences not followed by the deletions', () => {
    const chunkLines = ['x', 'y', 'x', 'z', ''];
    expect(findChunkPosition(chunkLines, chunk({ context: ['x'], deletions: ['z'] }))).toBe(3);
  });

  it('should return the first context occurrence when no deletions follow any of them', () => {
    const chunkLines = ['x', 'y', 'x', 'z', ''];
    expect(findChunkPosition(chunkLines, chunk({ context: ['x'], deletions: ['w'] }))).toBe(1);
  });

  it('should fall back to the scope marker, case-insensitively', () => {
    expect(findChunkPosition(lines, chunk({ scope: 'FOO()', deletions: ['  x'] }))).toBe(1);
  });

  it('should locate bare deletions', () => {
    expect(findChunkPosition(lines, chunk({ deletions: ['}'] }))).toBe(2);
  });

  it('should fail when nothing can be found', () => {
    expect(() => findChunkPosition(lines, chunk({ context: ['missing'] }))).toThrow(
      'could not locate context in file'
    );
  });
});

describe('applyChunkAt', () => {
  it('should verify deletions with surrounding whitespace ignored', () => {
    expect(applyChunkAt(['a', '  b '], chunk({ deletions: ['b'], additions: ['B'] }), 1)).toEqual([
      'a',
      'B',
    ]);
  });

  it('should name the mismatched line', () => {
    expect(() => applyChunkAt(['a', 'b'], chunk({ deletions: ['x'] }), 1)).toThrow(
      'deletion mismatch at line 2: expected "x", found "b"'
    );
  });

  it('should reject deletions past the end of the file', () => {
    expect(() => applyChunkAt(['a', 'b'], chunk({ deletions: ['x'] }), 2)).toThrow(
      'deletion line 3 beyond end of file'
    );
  });
});

describe('applyChunks', () => {
  it('should apply a chunk and report the edited post-image lines', () => {
    const result = applyChunks('a\nb\nc\n', [
      chunk({ context: ['a'], deletions: ['b'], additions: ['B', 'B2'] }),
    ]);

    expect(result).toEqual({ content: 'a\nB\nB2\nc\n', editStartLine: 2, editEndLine: 3 });
  });

  it('should position later chunks against the already edited lines', () => {
    const result = applyChunks('one\ntwo\nthree', [
      chunk({ deletions: ['one'], additions: ['1', '1b'] }),
      chunk({ context: ['1b', 'two'], deletions: ['three'], additions: ['3'] }),
    ]);

    expect(result.content).toBe('1\n1b\ntwo\n3');
    expect(result.editStartLine).toBe(1);
    expect(result.editEndLine).toBe(4);
  });

  it('should delete lines when a chunk adds nothing', () => {
    const result = applyChunks('keep1\ndelete1\ndelete2\nkeep2\n', [
      chunk({ deletions: ['delete1', 'delete2'] }),
    ]);

    expect(result.content).toBe('keep1\nkeep2\n');
  });

  it('should apply a chunk whose context first appears before the edited line', () => {
    const result = applyChunks('x\ny\nx\nz\n', [
      chunk({ context: ['x'], deletions: ['z'], additions: ['Z'] }),
    ]);

    expect(result.content).toBe('x\ny\nx\nZ\n');
  });

  it('should reject a patch that changes nothing', () => {
    expect(() =>
      applyChunks('a\nb', [chunk({ deletions: ['b'], additions: ['b'] })])
    ).toThrow('patch resulted in no changes - deletions and additions are identical');
  });

  it('should prefix failures with the chunk number and the locate context', () => {
    const chunks = [
      chunk({ deletions: ['a'], additions: ['A'] }),
      chunk({ context: ['zzz'], deletions: ['b'] }),
    ];

    expect(() =>
      applyChunks('a\nb', chunks, { locateContext: () => 'searched lines 1-2' })
    ).toThrow('chunk 2: searched lines 1-2: could not locate context in file');
  });

  it('should report chunks under the numbers given for them', () => {
    const chunks = [chunk({ context: ['zzz'], deletions: ['b'] })];

    expect(() => applyChunks('a\nb', chunks, { chunkNumbers: [3] })).toThrow(
      'chunk 3: could not locate context in file'
    );
  });

  it('should prefix deletion mismatches with the chunk number', () => {
    expect(() =>
      applyChunks('a\nb', [chunk({ context: ['a'], deletions: ['x'], additions: ['y'] })])
    ).toThrow('chunk 1: deletion mismatch at line 2: expected "x", found "b"');
  });
});

describe('applyChunks on generated edits', () => {
  // Park-Miller generator, so every run sees the same cases
  function sequence(seed: number): () => number {
    let state = seed;
    return () => {
      state = (state * 48271) % 2147483647;
      return state / 2147483647;
    };
  }

  it('should turn the original into the edited text whenever the chunk is unique', () => {
    const next = sequence(7);
    const pick = (n: number): number => Math.floor(next() * n);
    let checked = 0;

    for (let round = 0; round < 200; round++) {
      const lineCount = 3 + pick(8);
      const original = Array.from({ length: lineCount }, () => ['x', 'y', 'z'][pick(3)] ?? 'x');
      const start = pick(lineCount);
      const deleteCount = 1 + pick(Math.min(2, lineCount - start));
      const contextCount = Math.min(pick(4), start);
      const additions = Array.from({ length: pick(3) }, () => ['P', 'Q'][pick(2)] ?? 'P');

      const context = original.slice(start - contextCount, start);
      const deletions = original.slice(start, start + deleteCount);
      const edited = [
        ...original.slice(0, start),
        ...additions,
        ...original.slice(start + deleteCount),
      ];

      const lines = [...original, ''];
      if (matchLines(lines, [...context, ...deletions], 'exact') !== start - contextCount) {
        continue;
      }

      const result = applyChunks(original.join('\n') + '\n', [
        chunk({ context, deletions, additions }),
      ]);
      expect(result.content).toBe(edited.map((line) => line + '\n').join(''));
      checked++;
    }

    expect(checked).toBeGreaterThan(20);
  });
});
