/**
 * Mock for @anthropic-ai/sdk module.
 *
 * Provides a queue of canned responses (or failures) for messages.create()
 * so both agent phases can be tested without real API calls.
 */

import { vi } from 'vitest';

/**
 * Text block response from Anthropic API.
 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Tool use block response from Anthropic API.
 */
export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: unknown;
}

export type ContentBlock = TextBlock | ToolUseBlock;

/**
 * Mock response structure matching Anthropic API response.
 */
export interface MockResponse {
  content: ContentBlock[];
  stop_reason: 'end_turn' | 'tool_use';
  usage: MockUsage;
}

export interface MockUsage {
  input_tokens: number;
  output_tokens: number;
}

/** Usage attached to every canned response unless a test overrides it. */
export const DEFAULT_USAGE: MockUsage = { input_tokens: 10, output_tokens: 5 };

/** A queued entry is either a response or an error to throw. */
type QueuedResponse = MockResponse | Error;

let mockResponses: QueuedResponse[] = [];

export interface CreateCall {
  model: string;
  messages: unknown[];
  system?: string;
  max_tokens?: number;
  temperature?: number;
  tools?: unknown[];
}

// Call history for assertions
let createCalls: CreateCall[] = [];

/**
 * Set the mock responses to return from messages.create().
 * Responses are consumed in order. An Error entry is thrown instead of
 * returned. If the queue is empty, a default text response is returned.
 */
export function setMockResponses(responses: QueuedResponse[]): void {
  mockResponses = [...responses];
}

/**
 * Create a simple text response.
 */
export function createTextResponse(text: string): MockResponse {
  return {
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
    usage: { ...DEFAULT_USAGE },
  };
}

/**
 * Create a tool use response.
 */
export function createToolUseResponse(
  toolName: string,
  input: unknown,
  toolId = 'tool_123'
): MockResponse {
  return {
    content: [{ type: 'tool_use', id: toolId, name: toolName, input }],
    stop_reason: 'tool_use',
    usage: { ...DEFAULT_USAGE },
  };
}

/**
 * Create a response carrying several tool calls, in order.
 */
export function createMultiToolResponse(
  calls: Array<{ name: string; input: unknown; id: string }>
): MockResponse {
  return {
    content: calls.map((call) => ({ type: 'tool_use', id: call.id, name: call.name, input: call.input })),
    stop_reason: 'tool_use',
    usage: { ...DEFAULT_USAGE },
  };
}

/**
 * Get all calls made to messages.create() for assertions.
 */
export function getCreateCalls(): CreateCall[] {
  return [...createCalls];
}

/**
 * Clear mock state. Call this in beforeEach.
 */
export function clearMockState(): void {
  mockResponses = [];
  createCalls = [];
}

// Mock the messages.create method
const mockCreate = vi.fn(async (params: CreateCall) => {
  createCalls.push({
    model: params.model,
    messages: params.messages,
    system: params.system,
    max_tokens: params.max_tokens,
    temperature: params.temperature,
    tools: params.tools,
  });

  const next = mockResponses.shift();
  if (next instanceof Error) {
    throw next;
  }
  if (next) {
    return next;
  }

  // Default response
  return createTextResponse('Mock response');
});

// Mock Anthropic class
class MockAnthropic {
  messages = {
    create: mockCreate,
  };

  constructor(_config?: { apiKey?: string }) {
    // Constructor accepts config but doesn't use it in mock
  }
}

// Export as default (matches how Anthropic SDK is imported)
export default MockAnthropic;

// Also export the mock function for direct access in tests
export { mockCreate };
