/**
 * Tool type definitions (canonical location).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';

/**
 * Field specification for validateInput.
 */
export interface FieldSpec {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  /** Element type for arrays */
  items?: 'string' | 'number' | 'boolean';
  required: boolean;
  /** Reject blank strings and empty arrays. Defaults to `required`. */
  nonEmpty?: boolean;
  /** Shown to the model in the tool schema and the deliberation tool list */
  description: string;
  /** Custom validator returning an error message or null if valid. */
  validate?: (value: unknown) => string | null;
}

export type ToolInputSpec = Record<string, FieldSpec>;

/**
 * Pairs a tool definition sent to the model with the spec its input is
 * validated against.
 */
export interface ToolDefinition {
  tool: Tool;
  spec: ToolInputSpec;
}
