/**
 * Outreach tools.
 *
 * Two tools are declared to the model: `process_email_and_label`, which saves
 * one labeled draft, and `end_execution_loop`, which ends the execution
 * phase. Each is a variant of ToolCall; parseToolCall validates the raw call
 * against its variant's spec before anything is dispatched.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { ToolDefinition, ToolInputSpec } from '../../../tools/types.js';
import { isStringArray, toInputSchema, validateInput } from '../../../tools/utils.js';
import { SchemaError } from '../errors.js';
import type { ValidatedArgs } from '../types.js';

const EMAIL_ADDRESS = /^[^\s@<>()",;:]+@[^\s@<>()",;:]+\.[^\s@<>()",;:]{2,}$/;

export function isValidEmailAddress(address: string): boolean {
  return EMAIL_ADDRESS.test(address.trim());
}

const PROCESS_EMAIL_SPEC: ToolInputSpec = {
  to_addrs: {
    type: 'array',
    items: 'string',
    required: true,
    description: 'Recipient email addresses, in order. At least one.',
    validate: (value) => {
      if (!isStringArray(value)) return null;
      const invalid = value.find((addr) => !isValidEmailAddress(addr));
      return invalid === undefined ? null : `Invalid email address: ${invalid}`;
    },
  },
  subject: {
    type: 'string',
    required: true,
    description: 'Email subject line.',
    validate: (value) => (typeof value === 'string' && /[\r\n]/.test(value) ? 'subject must be a single line.' : null),
  },
  body: {
    type: 'string',
    required: true,
    description: 'Email body. HTML by default.',
  },
  attachment_path: {
    type: 'string',
    required: false,
    description: 'Path of a single file to attach.',
  },
  attachment_paths: {
    type: 'array',
    items: 'string',
    required: false,
    description: 'Paths of files to attach. Combined with attachment_path; duplicates are attached once.',
  },
};

/** Stands in for a summary the model left out or left blank. */
export const MISSING_SUMMARY = 'No summary provided by end_execution_loop.';

const END_EXECUTION_LOOP_SPEC: ToolInputSpec = {
  summary: {
    type: 'string',
    required: false,
    description: 'What was accomplished, any remaining work, and any errors encountered.',
  },
};

export const processEmailAndLabel: ToolDefinition = {
  tool: {
    name: 'process_email_and_label',
    description: 'Save an email (HTML by default) as a Gmail draft with optional attachments, then label it for later retrieval. The draft is never sent.',
    input_schema: toInputSchema(PROCESS_EMAIL_SPEC),
  },
  spec: PROCESS_EMAIL_SPEC,
};

export const endExecutionLoop: ToolDefinition = {
  tool: {
    name: 'end_execution_loop',
    description: 'Signal that every planned action is complete, or that no further progress is possible, and summarize the outcome.',
    input_schema: toInputSchema(END_EXECUTION_LOOP_SPEC),
  },
  spec: END_EXECUTION_LOOP_SPEC,
};

const allTools: ToolDefinition[] = [processEmailAndLabel, endExecutionLoop];

/**
 * Tool definitions for the Anthropic API.
 */
export const OUTREACH_TOOLS: Tool[] = allTools.map((t) => t.tool);

/**
 * A validated tool call, tagged by tool name.
 */
export type ToolCall =
  | { name: 'process_email_and_label'; args: ValidatedArgs }
  | { name: 'end_execution_loop'; args: { summary: string } };

/**
 * @throws SchemaError
 */
export function validateProcessEmailArgs(input: unknown): ValidatedArgs {
  const record = validateInput(input, PROCESS_EMAIL_SPEC);
  const { to_addrs, subject, body, attachment_path, attachment_paths } = record;

  return {
    toAddrs: isStringArray(to_addrs) ? to_addrs.map((addr) => addr.trim()) : [],
    subject: typeof subject === 'string' ? subject : '',
    body: typeof body === 'string' ? body : '',
    attachmentPath: typeof attachment_path === 'string' && attachment_path.trim() ? attachment_path : null,
    attachmentPaths: isStringArray(attachment_paths) ? attachment_paths : null,
  };
}

/**
 * Validate a raw tool call and return its typed variant.
 *
 * @throws SchemaError (`UnknownTool` for undeclared names)
 */
export function parseToolCall(name: string, input: unknown): ToolCall {
  switch (name) {
    case 'process_email_and_label':
      return { name, args: validateProcessEmailArgs(input) };
    case 'end_execution_loop': {
      const { summary } = validateInput(input, END_EXECUTION_LOOP_SPEC);
      const text = typeof summary === 'string' ? summary.trim() : '';
      return { name, args: { summary: text || MISSING_SUMMARY } };
    }
    default:
      throw new SchemaError('UnknownTool', `Unknown tool: ${name}`);
  }
}

/**
 * Plain-text tool list for the deliberation prompt, where tools are
 * described but not callable.
 */
export function describeTools(tools: ToolDefinition[] = allTools): string {
  return tools
    .map(({ tool, spec }) => {
      const params = Object.entries(spec)
        .map(([field, f]) => {
          const type = f.type === 'array' && f.items ? `array<${f.items}>` : f.type;
          const optionality = f.required ? 'required' : 'optional';
          return `      - ${field} (${type}, ${optionality}): ${f.description}`;
        })
        .join('\n');
      return `Tool: ${tool.name}\n  Description: ${tool.description ?? ''}\n  Parameters:\n${params}`;
    })
    .join('\n\n');
}
