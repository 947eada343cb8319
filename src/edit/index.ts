/**
 * Edit engine public API.
 */

export { locateText, countMatches, lineNumberAt } from './locator.js';
export type { MatchLevel, MatchResult } from './locator.js';

export {
  FuzzyMatcher,
  findMostSimilarLine,
  findSimilarChunk,
  similarityRatio,
  sequenceMatcherRatio,
  MAX_FUZZY_SEARCH_COST,
} from './fuzzy.js';
export type { FuzzyMatch, SimilarLine, SimilarChunk } from './fuzzy.js';

export { parsePatch, PatchParseError, BEGIN_PATCH, END_PATCH } from './patch-parser.js';
export type { FilePatch, PatchChunk, PatchAction } from './patch-parser.js';

export { applyChunks } from './patch-applier.js';
export type { ApplyChunksOptions } from './patch-applier.js';
export type { AppliedChunks } from './patch-applier.js';

export { applyLineEdit } from './line-edit.js';
export { readLineRange, findLineMatches, streamingReplace } from './streaming.js';
export type { LineRange, LineMatches } from './streaming.js';
export { renderUnifiedDiff, renderPostEditContext } from './render.js';

export { executeEdit, parseEditRequest } from './engine.js';
export type { EditParams, EditRequest, EditMode, EditEnvironment } from './engine.js';

export { EditSession } from './pending.js';
export type {
  EditSessionOptions,
  PendingEdit,
  PendingWrite,
  PendingKind,
  GateDecision,
  LineWindow,
  WindowRegion,
} from './pending.js';

export { ToolCallHistory, analyzePendingEditState, recordFromOutput } from './history.js';
export type { ToolCallRecord, ToolCallStatus, PendingEditState } from './history.js';
export { ReadTracker } from './read-tracker.js';

export { isFailure, isPending } from './results.js';
export type {
  EditResult,
  FailureResult,
  PreviewResult,
  AppliedResult,
  MultiFileResult,
  WriteResult,
} from './results.js';
