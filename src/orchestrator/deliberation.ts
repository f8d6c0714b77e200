/**
 * Deliberation Phase
 *
 * Asks the model for a step-by-step plan with no tools attached. The model
 * sees a text description of the tools so it can name calls and arguments,
 * but nothing it says here has side effects.
 */

import type { Message } from '@anthropic-ai/sdk/resources/messages';

import { extractText } from '../services/anthropic/client.js';
import {
  BASE_AGENT_PROMPT,
  DELIBERATION_PROMPT,
  OUTREACH_PERSONA,
} from '../domains/outreach/runtime/prompt.js';
import { describeTools } from '../domains/outreach/runtime/tools.js';
import { DeliberationError } from '../domains/outreach/errors.js';
import { errorMessage } from '../utils/errors.js';
import { recordUsage } from './types.js';
import type { ConversationState, DeliberationResult, PhaseDependencies } from './types.js';

export function buildDeliberationSystemPrompt(): string {
  return [
    BASE_AGENT_PROMPT,
    DELIBERATION_PROMPT,
    OUTREACH_PERSONA,
    `## Available tools (Execution stage only)\n\n${describeTools()}`,
  ].join('\n\n');
}

/**
 * Produce a plan for the task and record it in the conversation.
 *
 * An empty plan is returned as-is. Only a failed completion call is an error.
 *
 * @throws DeliberationError when the completion service fails
 */
export async function deliberate(
  taskPrompt: string,
  state: ConversationState,
  deps: PhaseDependencies
): Promise<DeliberationResult> {
  const startTime = Date.now();
  state.messages.push({ role: 'user', content: taskPrompt });

  let response: Message;
  try {
    response = await deps.client.messages.create({
      model: deps.models.planner,
      max_tokens: deps.maxTokens,
      temperature: 0,
      system: buildDeliberationSystemPrompt(),
      messages: [...state.messages],
    });
  } catch (error) {
    deps.logger.error('deliberation_failed', { error: errorMessage(error) });
    throw new DeliberationError(`Deliberation failed: ${errorMessage(error)}`);
  }

  recordUsage(state, response.usage);
  const text = extractText(response.content);
  if (!text) {
    deps.logger.warn('deliberation_empty_plan', { stopReason: response.stop_reason });
  }

  // The plan becomes part of the history execution continues from.
  state.messages.push({ role: 'assistant', content: text || '(No plan was produced.)' });

  deps.logger.info('deliberation_complete', {
    planLength: text.length,
    durationMs: Date.now() - startTime,
  });

  return { text };
}
