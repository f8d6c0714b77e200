/**
 * Anthropic completion client and response helpers shared by both agent
 * phases.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  ContentBlockParam,
  TextBlock,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';
import config from '../../config.js';

let client: Anthropic | null = null;

/**
 * Get the shared Anthropic client, created on first use.
 */
export function getClient(): Anthropic {
  if (!client) {
    if (!config.anthropicApiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    client = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return client;
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

export function isToolUseBlock(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

/**
 * Concatenated text of a response, trimmed.
 */
export function extractText(content: ContentBlock[]): string {
  return content
    .filter(isTextBlock)
    .map((block) => block.text)
    .join('\n')
    .trim();
}

/**
 * Replay a response as an assistant turn. Only text and tool_use blocks are
 * carried over; the loop never relies on other block kinds.
 */
export function toAssistantContent(content: ContentBlock[]): ContentBlockParam[] {
  const params: ContentBlockParam[] = [];
  for (const block of content) {
    if (isTextBlock(block)) {
      params.push({ type: 'text', text: block.text });
    } else if (isToolUseBlock(block)) {
      params.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input });
    }
  }
  return params;
}
