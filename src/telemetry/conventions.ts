/**
 * Span attribute names.
 *
 * Tool spans follow the OpenTelemetry GenAI semantic conventions
 * (https://opentelemetry.io/docs/specs/semconv/gen-ai/); edit spans use the
 * project's own `edit.*` namespace.
 */

// -----------------------------------------------------------------------------
// GenAI Tool Attributes
// -----------------------------------------------------------------------------

/** The name of the GenAI operation being performed */
export const ATTR_GEN_AI_OPERATION_NAME = 'gen_ai.operation.name';

/** Name of the tool utilized by the agent */
export const ATTR_GEN_AI_TOOL_NAME = 'gen_ai.tool.name';

/** The tool call identifier */
export const ATTR_GEN_AI_TOOL_CALL_ID = 'gen_ai.tool.call.id';

/** Parameters passed to the tool call (sensitive) */
export const ATTR_GEN_AI_TOOL_CALL_ARGUMENTS = 'gen_ai.tool.call.arguments';

/** The result returned by the tool call (sensitive) */
export const ATTR_GEN_AI_TOOL_CALL_RESULT = 'gen_ai.tool.call.result';

// -----------------------------------------------------------------------------
// Edit Attributes
// -----------------------------------------------------------------------------

/** Edit request kind: `patch`, `searchReplace` or `lineRange` */
export const ATTR_EDIT_MODE = 'edit.mode';

/** Target path as the model wrote it (absent for patches) */
export const ATTR_EDIT_PATH = 'edit.path';

/** Locator cascade level of the match, -1 when nothing matched */
export const ATTR_EDIT_MATCH_LEVEL = 'edit.match_level';

/** Whether the edit is held for confirmation instead of written */
export const ATTR_EDIT_PREVIEW = 'edit.preview';

// -----------------------------------------------------------------------------
// Error Attributes
// -----------------------------------------------------------------------------

/** Describes a class of error the operation ended with */
export const ATTR_ERROR_TYPE = 'error.type';

// -----------------------------------------------------------------------------
// Well-Known Values
// -----------------------------------------------------------------------------

export const GEN_AI_OPERATION = {
  EXECUTE_TOOL: 'execute_tool',
} as const;

export type GenAIOperationName = (typeof GEN_AI_OPERATION)[keyof typeof GEN_AI_OPERATION];
