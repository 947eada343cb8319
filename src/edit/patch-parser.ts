/**
 * Parser for the patch dialect accepted by the edit tool.
 *
 * ```
 * *** Begin Patch
 * *** Update File: src/app.ts
 * @@ function main() :line 40
 *  const a = 1;
 * -const b = 2;
 * +const b = 3;
 *  return a + b;
 * *** Add File: src/new.ts
 * +export const x = 1;
 * *** Delete File: src/old.ts
 * *** End Patch
 * ```
 *
 * Text outside Begin/End markers is ignored and a missing End marker is
 * tolerated. The only parse failure is an unrecognized line inside a file
 * section.
 */

/** What a file section does */
export type PatchAction = 'add' | 'update' | 'delete';

/**
 * One hunk within a file section.
 */
export interface PatchChunk {
  /** Free-text locator from the `@@` header, e.g. a function signature */
  scope: string;
  /** Line number from a trailing `:line N` on the `@@` header, 0 when absent */
  lineHint: number;
  /** Unchanged lines before the change */
  context: string[];
  /** Lines removed */
  deletions: string[];
  /** Lines inserted in place of the deletions */
  additions: string[];
  /** Unchanged lines after the change */
  postContext: string[];
}

/**
 * All changes to one file.
 */
export interface FilePatch {
  action: PatchAction;
  path: string;
  chunks: PatchChunk[];
}

/**
 * Raised for a line that fits none of the recognized prefixes.
 */
export class PatchParseError extends Error {
  constructor(
    /** 1-based line number within the patch text */
    readonly line: number,
    readonly text: string
  ) {
    super(
      `line ${String(line)}: unexpected line format (must start with space, -, +, or @@ ): ${JSON.stringify(text)}`
    );
    this.name = 'PatchParseError';
  }
}

// -----------------------------------------------------------------------------
// Markers
// -----------------------------------------------------------------------------

export const BEGIN_PATCH = '*** Begin Patch';
export const END_PATCH = '*** End Patch';

const FILE_HEADERS: ReadonlyArray<readonly [string, PatchAction]> = [
  ['*** Add File:', 'add'],
  ['*** Update File:', 'update'],
  ['*** Delete File:', 'delete'],
];

const SCOPE_PREFIX = '@@ ';

/** Trailing `:line N` on a scope header */
const LINE_HINT_PATTERN = /:line\s+(\d+)\s*$/;

export function emptyChunk(scope = '', lineHint = 0): PatchChunk {
  return { scope, lineHint, context: [], deletions: [], additions: [], postContext: [] };
}

function hasBody(chunk: PatchChunk): boolean {
  return chunk.context.length > 0 || chunk.deletions.length > 0 || chunk.additions.length > 0;
}

// -----------------------------------------------------------------------------
// Parser
// -----------------------------------------------------------------------------

/**
 * Parse patch text into per-file change lists, in document order.
 *
 * @throws PatchParseError on an unrecognized line inside a file section
 */
export function parsePatch(text: string): FilePatch[] {
  const patches: FilePatch[] = [];
  let file: FilePatch | null = null;
  let chunk: PatchChunk | null = null;
  let inPatch = false;

  const flush = (): void => {
    if (file && chunk) {
      file.chunks.push(chunk);
    }
    if (file) {
      patches.push(file);
    }
    file = null;
    chunk = null;
  };

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    if (line.startsWith(BEGIN_PATCH)) {
      inPatch = true;
      continue;
    }
    if (line.startsWith(END_PATCH)) {
      flush();
      inPatch = false;
      continue;
    }
    if (!inPatch) continue;

    const header = FILE_HEADERS.find(([prefix]) => line.startsWith(prefix));
    if (header) {
      const [prefix, action] = header;
      flush();
      file = { action, path: line.slice(prefix.length).trim(), chunks: [] };
      // Add File bodies are bare `+` lines with no @@ header
      chunk = action === 'add' ? emptyChunk() : null;
      continue;
    }

    // Lines between Begin Patch and the first file header
    if (!file) continue;
    const current: FilePatch = file;

    if (line.startsWith(SCOPE_PREFIX)) {
      if (chunk && hasBody(chunk)) {
        current.chunks.push(chunk);
      }
      chunk = parseScopeHeader(line.slice(SCOPE_PREFIX.length));
      continue;
    }

    chunk ??= emptyChunk();
    const body: PatchChunk = chunk;

    if (line === '' || line.startsWith(' ')) {
      const content = line.slice(1);
      if (body.deletions.length > 0 || body.additions.length > 0) {
        body.postContext.push(content);
      } else {
        body.context.push(content);
      }
    } else if (line.startsWith('-')) {
      body.deletions.push(line.slice(1));
    } else if (line.startsWith('+')) {
      body.additions.push(line.slice(1));
    } else {
      throw new PatchParseError(i + 1, line);
    }
  }

  flush();
  return patches;
}

/**
 * Split a `@@` header into scope text and line hint.
 */
function parseScopeHeader(header: string): PatchChunk {
  const match = LINE_HINT_PATTERN.exec(header);
  if (!match) {
    return emptyChunk(header);
  }
  const lineHint = Number.parseInt(match[1] ?? '0', 10);
  return emptyChunk(header.replace(LINE_HINT_PATTERN, '').trim(), lineHint);
}
