/**
 * Orchestrator Type Definitions
 *
 * Types for the deliberate-then-act loop: the run-owned conversation state,
 * the plan produced by deliberation, and the per-tool-call state machine
 * walked during execution.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { MessageParam, Usage } from '@anthropic-ai/sdk/resources/messages';
import type { DraftComposer } from '../domains/outreach/service/composer.js';
import type { EmailDraft } from '../domains/outreach/types.js';
import type { AppLogger } from '../utils/observability/index.js';

// ============================================================================
// Tool Call State Machine
// ============================================================================

/**
 * State of one tool call during execution.
 * Planned → Validating → Composing → Succeeded | Failed
 * (Validating may go straight to Succeeded for end_execution_loop, or to
 * Failed on a schema error; nothing reaches Composing unvalidated.)
 */
export type ToolCallState = 'Planned' | 'Validating' | 'Composing' | 'Succeeded' | 'Failed';

export interface ToolCallRecord {
  toolUseId: string;
  name: string;
  /** Every state visited, in order */
  states: ToolCallState[];
  error?: string;
}

// ============================================================================
// Conversation State
// ============================================================================

/**
 * Everything one run accumulates. Created fresh per run and never shared.
 */
export interface ConversationState {
  /** Original task prompt */
  taskPrompt: string;

  /** Messages sent to the completion service, both phases */
  messages: MessageParam[];

  /** Tool calls seen during execution */
  toolCalls: ToolCallRecord[];

  /** Drafts saved during execution */
  drafts: EmailDraft[];

  /** Tokens reported by the completion service, both phases */
  usage: TokenUsage;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export function createConversationState(taskPrompt: string): ConversationState {
  return {
    taskPrompt,
    messages: [],
    toolCalls: [],
    drafts: [],
    usage: { inputTokens: 0, outputTokens: 0 },
  };
}

export function recordUsage(state: ConversationState, usage: Usage): void {
  state.usage.inputTokens += usage.input_tokens;
  state.usage.outputTokens += usage.output_tokens;
}

// ============================================================================
// Phase Types
// ============================================================================

/**
 * Plan text from the deliberation phase. May be empty; execution copes.
 */
export interface DeliberationResult {
  text: string;
}

/**
 * Collaborators and limits shared by both phases.
 */
export interface PhaseDependencies {
  client: Anthropic;
  composer: DraftComposer;
  logger: AppLogger;
  models: {
    planner: string;
    agent: string;
  };
  maxExecutionTurns: number;
  maxTokens: number;
}

export const AGENT_DEFAULTS = {
  maxExecutionTurns: 10,
  maxTokens: 4096,
} as const;
