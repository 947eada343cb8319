/**
 * Tests for the patch dialect parser.
 */

import { describe, expect, it } from '@jest/globals';

import { PatchParseError, parsePatch } from '../patch-parser.js';

describe('parsePatch', () => {
  it('should parse update, add and delete sections in order', () => {
    const text = [
      '*** Begin Patch',
      '*** Update File: src/app.ts',
      '@@ function main() :line 40',
      ' const a = 1;',
      '-const b = 2;',
      '+const b = 3;',
      ' return a + b;',
      '*** Add File: new.ts',
      '+export const x = 1;',
      '*** Delete File: old.ts',
      '*** End Patch',
    ].join('\n');

    expect(parsePatch(text)).toEqual([
      {
        action: 'update',
        path: 'src/app.ts',
        chunks: [
          {
            scope: 'function main()',
            lineHint: 40,
            context: ['const a = 1;'],
            deletions: ['const b = 2;'],
            additions: ['const b = 3;'],
            postContext: ['return a + b;'],
          },
        ],
      },
      {
        action: 'add',
        path: 'new.ts',
        chunks: [
          {
            scope: '',
            lineHint: 0,
            context: [],
            deletions: [],
            additions: ['export const x = 1;'],
            postContext: [],
          },
        ],
      },
      { action: 'delete', path: 'old.ts', chunks: [] },
    ]);
  });

  it('should start a new chunk at each scope header', () => {
    const text = [
      '*** Begin Patch',
      '*** Update File: a.txt',
      '@@ first',
      '-x',
      '+y',
      '@@ second',
      '-q',
      '+r',
      '*** End Patch',
    ].join('\n');

    const [file] = parsePatch(text);
    expect(file?.chunks.map((chunk) => chunk.scope)).toEqual(['first', 'second']);
    expect(file?.chunks[1]?.additions).toEqual(['r']);
  });

  it('should keep a chunk without context and drop a header without a body', () => {
    const text = [
      '*** Begin Patch',
      '*** Update File: a.txt',
      '@@ empty',
      '@@ deletions only',
      '-x',
      '@@ last',
      ' keep',
      '+y',
      '*** End Patch',
    ].join('\n');

    const [file] = parsePatch(text);
    expect(file?.chunks.map((chunk) => chunk.scope)).toEqual(['deletions only', 'last']);
    expect(file?.chunks[0]?.deletions).toEqual(['x']);
  });

  it('should treat an empty line as empty context', () => {
    const text = ['*** Begin Patch', '*** Update File: a', '', '-x', '+y', '*** End Patch'].join('\n');

    expect(parsePatch(text)[0]?.chunks[0]?.context).toEqual(['']);
  });

  it('should ignore text outside the markers and tolerate a missing end marker', () => {
    const text = ['Here is the patch:', '*** Begin Patch', '*** Update File: a', '-x', '+y'].join(
      '\n'
    );

    const patches = parsePatch(text);
    expect(patches).toHaveLength(1);
    expect(patches[0]?.chunks[0]?.deletions).toEqual(['x']);
  });

  it('should return nothing for text without a patch', () => {
    expect(parsePatch('just prose')).toEqual([]);
  });

  it('should reject an unrecognized line inside a file section', () => {
    const text = ['*** Begin Patch', '*** Update File: a', 'oops', '*** End Patch'].join('\n');

    expect(() => parsePatch(text)).toThrow(PatchParseError);
    expect(() => parsePatch(text)).toThrow(
      'line 3: unexpected line format (must start with space, -, +, or @@ ): "oops"'
    );
  });
});
