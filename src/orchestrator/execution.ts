/**
 * Execution Phase
 *
 * Runs the tool loop against the deliberation plan:
 * 1. Ask the model for its next action (tools attached)
 * 2. Validate each tool call, in order, against its schema
 * 3. Dispatch process_email_and_label to the draft composer
 * 4. Feed results back until the model calls end_execution_loop
 *
 * There are no automatic retries. The first failed tool call ends the run.
 */

import type {
  Message,
  ToolResultBlockParam,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';

import { isToolUseBlock, toAssistantContent } from '../services/anthropic/client.js';
import {
  BASE_AGENT_PROMPT,
  EXECUTION_PROMPT,
  NO_TOOL_CALL_NUDGE,
  OUTREACH_PERSONA,
} from '../domains/outreach/runtime/prompt.js';
import { OUTREACH_TOOLS, parseToolCall } from '../domains/outreach/runtime/tools.js';
import type { ToolCall } from '../domains/outreach/runtime/tools.js';
import { failed, succeeded } from '../domains/outreach/types.js';
import type { ExecutionResult } from '../domains/outreach/types.js';
import { errorMessage } from '../utils/errors.js';
import { safeSnippet } from '../utils/observability/index.js';
import { recordUsage } from './types.js';
import type {
  ConversationState,
  DeliberationResult,
  PhaseDependencies,
  ToolCallRecord,
  ToolCallState,
} from './types.js';

export const EXECUTION_KICKOFF = 'Carry out the Deliberation Plan now, one tool call at a time.';

type ToolCallOutcome =
  | { kind: 'composed'; status: string }
  | { kind: 'ended'; summary: string }
  | { kind: 'failed'; error: string };

export function buildExecutionSystemPrompt(plan: DeliberationResult): string {
  return [
    BASE_AGENT_PROMPT,
    EXECUTION_PROMPT,
    OUTREACH_PERSONA,
    `Deliberation Plan:\n${plan.text || '(No plan was produced. Work from the request directly.)'}`,
  ].join('\n\n');
}

/**
 * Walk one tool call through Planned → Validating → Composing → terminal.
 */
async function runToolCall(
  toolUse: ToolUseBlock,
  state: ConversationState,
  deps: PhaseDependencies
): Promise<ToolCallOutcome> {
  const record: ToolCallRecord = { toolUseId: toolUse.id, name: toolUse.name, states: [] };
  state.toolCalls.push(record);
  const log = deps.logger.child({ toolName: toolUse.name, toolUseId: toolUse.id });

  const enter = (next: ToolCallState): void => {
    record.states.push(next);
    log.debug('tool_call_state', { state: next });
  };
  const fail = (error: string): ToolCallOutcome => {
    record.error = error;
    enter('Failed');
    log.warn('tool_call_failed', { error });
    return { kind: 'failed', error };
  };

  enter('Planned');
  enter('Validating');

  let call: ToolCall;
  try {
    call = parseToolCall(toolUse.name, toolUse.input);
  } catch (error) {
    return fail(errorMessage(error));
  }

  switch (call.name) {
    case 'end_execution_loop':
      enter('Succeeded');
      return { kind: 'ended', summary: call.args.summary };

    case 'process_email_and_label': {
      enter('Composing');
      try {
        const outcome = await deps.composer.composeAndLabel(call.args);
        state.drafts.push(outcome.draft);
        enter('Succeeded');
        return { kind: 'composed', status: outcome.status };
      } catch (error) {
        return fail(errorMessage(error));
      }
    }
  }
}

function finish(lastStatus: string | null, summary: string): ExecutionResult {
  return succeeded(lastStatus ?? summary);
}

/**
 * Execute the plan with tool access.
 *
 * Always resolves; every failure becomes an ExecutionResult error.
 */
export async function execute(
  plan: DeliberationResult,
  state: ConversationState,
  deps: PhaseDependencies
): Promise<ExecutionResult> {
  const system = buildExecutionSystemPrompt(plan);
  state.messages.push({ role: 'user', content: EXECUTION_KICKOFF });

  let lastStatus: string | null = null;

  for (let turn = 1; turn <= deps.maxExecutionTurns; turn++) {
    deps.logger.debug('execution_turn', { turn });

    let response: Message;
    try {
      response = await deps.client.messages.create({
        model: deps.models.agent,
        max_tokens: deps.maxTokens,
        system,
        tools: OUTREACH_TOOLS,
        messages: [...state.messages],
      });
    } catch (error) {
      deps.logger.error('execution_completion_failed', { turn, error: safeSnippet(errorMessage(error)) });
      return failed(`Execution failed: ${errorMessage(error)}`);
    }

    recordUsage(state, response.usage);
    const assistantContent = toAssistantContent(response.content);
    if (assistantContent.length > 0) {
      state.messages.push({ role: 'assistant', content: assistantContent });
    }

    const toolUses = response.content.filter(isToolUseBlock);
    if (toolUses.length === 0) {
      deps.logger.warn('execution_no_tool_call', { turn, stopReason: response.stop_reason });
      state.messages.push({ role: 'user', content: NO_TOOL_CALL_NUDGE });
      continue;
    }

    // Strictly in order: each call composes and labels its own draft.
    const toolResults: ToolResultBlockParam[] = [];
    for (const toolUse of toolUses) {
      const outcome = await runToolCall(toolUse, state, deps);

      if (outcome.kind === 'failed') {
        return failed(outcome.error);
      }
      if (outcome.kind === 'ended') {
        deps.logger.info('execution_ended', { turn, draftCount: state.drafts.length });
        return finish(lastStatus, outcome.summary);
      }

      lastStatus = outcome.status;
      toolResults.push({
        type: 'tool_result',
        tool_use_id: toolUse.id,
        content: JSON.stringify({ status: outcome.status, error: null }),
      });
    }

    state.messages.push({ role: 'user', content: toolResults });
  }

  deps.logger.warn('execution_turn_limit', {
    maxExecutionTurns: deps.maxExecutionTurns,
    draftCount: state.drafts.length,
  });

  if (lastStatus !== null) {
    return succeeded(lastStatus);
  }
  return failed('Execution turn limit reached');
}
