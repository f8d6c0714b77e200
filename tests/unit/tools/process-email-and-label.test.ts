/**
 * Boundary validation tests for the outreach tools.
 */

import { describe, it, expect } from 'vitest';
import {
  OUTREACH_TOOLS,
  describeTools,
  isValidEmailAddress,
  parseToolCall,
  validateProcessEmailArgs,
} from '../../../src/domains/outreach/runtime/tools.js';
import { SchemaError } from '../../../src/domains/outreach/errors.js';

function schemaErrorOf(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchemaError) return error;
    throw error;
  }
  throw new Error('expected a SchemaError');
}

const validInput = {
  to_addrs: ['jo@example.com'],
  subject: 'Checking in',
  body: '<p>Hello Jo,</p>',
};

describe('process_email_and_label validation', () => {
  it('accepts the minimal valid input with no attachments', () => {
    expect(validateProcessEmailArgs(validInput)).toEqual({
      toAddrs: ['jo@example.com'],
      subject: 'Checking in',
      body: '<p>Hello Jo,</p>',
      attachmentPath: null,
      attachmentPaths: null,
    });
  });

  it('keeps attachment inputs and trims recipient addresses', () => {
    const args = validateProcessEmailArgs({
      ...validInput,
      to_addrs: [' jo@example.com ', 'sam@example.org'],
      attachment_path: 'catalog.pdf',
      attachment_paths: ['order-form.pdf'],
    });

    expect(args.toAddrs).toEqual(['jo@example.com', 'sam@example.org']);
    expect(args.attachmentPath).toBe('catalog.pdf');
    expect(args.attachmentPaths).toEqual(['order-form.pdf']);
  });

  it('treats null and blank optional attachments as absent', () => {
    const args = validateProcessEmailArgs({ ...validInput, attachment_path: '  ', attachment_paths: null });
    expect(args.attachmentPath).toBeNull();
    expect(args.attachmentPaths).toBeNull();
  });

  it.each(['to_addrs', 'subject', 'body'])('rejects missing %s as MissingRequired', (field) => {
    const input: Record<string, unknown> = { ...validInput };
    delete input[field];

    const error = schemaErrorOf(() => validateProcessEmailArgs(input));
    expect(error.kind).toBe('MissingRequired');
    expect(error.code).toBe('SCHEMA_MISSING_REQUIRED');
    expect(error.field).toBe(field);
    expect(error.message).toBe(`${field} is required.`);
  });

  it('rejects null required fields as MissingRequired', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, subject: null }));
    expect(error.kind).toBe('MissingRequired');
    expect(error.message).toBe('subject is required.');
  });

  it('rejects an empty recipient list', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, to_addrs: [] }));
    expect(error.kind).toBe('MissingRequired');
    expect(error.message).toBe('to_addrs must not be empty.');
  });

  it('rejects a blank body', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, body: '   ' }));
    expect(error.kind).toBe('MissingRequired');
    expect(error.message).toBe('body must not be empty.');
  });

  it('rejects undeclared properties as UnknownProperty', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, cc: ['x@example.com'] }));
    expect(error.kind).toBe('UnknownProperty');
    expect(error.message).toBe('Unknown property: cc.');
  });

  it.each(['constructor', 'toString', 'hasOwnProperty', '__proto__'])(
    'rejects the inherited name %s as UnknownProperty',
    (key) => {
      const input: unknown = JSON.parse(`{"to_addrs":["jo@example.com"],"subject":"Hi","body":"<p>Hi</p>","${key}":"x"}`);
      const error = schemaErrorOf(() => validateProcessEmailArgs(input));
      expect(error.kind).toBe('UnknownProperty');
      expect(error.message).toBe(`Unknown property: ${key}.`);
    }
  );

  it('rejects to_addrs given as a string', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, to_addrs: 'jo@example.com' }));
    expect(error.kind).toBe('TypeMismatch');
    expect(error.message).toBe('to_addrs must be an array of strings.');
  });

  it('rejects a numeric subject', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, subject: 42 }));
    expect(error.kind).toBe('TypeMismatch');
    expect(error.message).toBe('subject must be a string.');
  });

  it('rejects attachment_paths with non-string entries', () => {
    const error = schemaErrorOf(() => validateProcessEmailArgs({ ...validInput, attachment_paths: ['a.pdf', 3] }));
    expect(error.kind).toBe('TypeMismatch');
    expect(error.field).toBe('attachment_paths');
  });

  it('rejects input that is not an object', () => {
    for (const input of ['text', 7, null, ['jo@example.com']]) {
      const error = schemaErrorOf(() => validateProcessEmailArgs(input));
      expect(error.kind).toBe('TypeMismatch');
      expect(error.message).toBe('Tool input must be an object.');
    }
  });

  it('rejects a syntactically invalid address as InvalidValue', () => {
    const error = schemaErrorOf(() =>
      validateProcessEmailArgs({ ...validInput, to_addrs: ['jo@example.com', 'not-an-address'] })
    );
    expect(error.kind).toBe('InvalidValue');
    expect(error.message).toBe('Invalid email address: not-an-address');
  });

  it('rejects a subject containing a line break', () => {
    const error = schemaErrorOf(() =>
      validateProcessEmailArgs({ ...validInput, subject: 'Hello\r\nBcc: x@example.com' })
    );
    expect(error.kind).toBe('InvalidValue');
    expect(error.message).toBe('subject must be a single line.');
  });
});

describe('isValidEmailAddress', () => {
  it.each(['jo@example.com', 'jo.smith+outreach@mail.example.co.uk'])('accepts %s', (address) => {
    expect(isValidEmailAddress(address)).toBe(true);
  });

  it.each(['jo', 'jo@', '@example.com', 'jo@example', 'jo smith@example.com', '<jo@example.com>'])(
    'rejects %s',
    (address) => {
      expect(isValidEmailAddress(address)).toBe(false);
    }
  );
});

describe('parseToolCall', () => {
  it('returns the process_email_and_label variant with validated args', () => {
    const call = parseToolCall('process_email_and_label', validInput);
    expect(call.name).toBe('process_email_and_label');
    if (call.name === 'process_email_and_label') {
      expect(call.args.toAddrs).toEqual(['jo@example.com']);
    }
  });

  it('returns the end_execution_loop variant with a trimmed summary', () => {
    expect(parseToolCall('end_execution_loop', { summary: ' Saved one draft. ' })).toEqual({
      name: 'end_execution_loop',
      args: { summary: 'Saved one draft.' },
    });
  });

  it('fills in a missing or blank end_execution_loop summary', () => {
    for (const input of [{}, { summary: null }, { summary: '  ' }]) {
      expect(parseToolCall('end_execution_loop', input)).toEqual({
        name: 'end_execution_loop',
        args: { summary: 'No summary provided by end_execution_loop.' },
      });
    }
  });

  it('still rejects a non-string summary', () => {
    const error = schemaErrorOf(() => parseToolCall('end_execution_loop', { summary: 3 }));
    expect(error.kind).toBe('TypeMismatch');
    expect(error.message).toBe('summary must be a string.');
  });

  it('rejects unknown tools as UnknownTool', () => {
    const error = schemaErrorOf(() => parseToolCall('send_email', validInput));
    expect(error.kind).toBe('UnknownTool');
    expect(error.code).toBe('SCHEMA_UNKNOWN_TOOL');
    expect(error.message).toBe('Unknown tool: send_email');
  });
});

describe('tool declarations', () => {
  it('declares both tools with closed schemas', () => {
    expect(OUTREACH_TOOLS.map((t) => t.name)).toEqual(['process_email_and_label', 'end_execution_loop']);

    const schema = OUTREACH_TOOLS[0].input_schema;
    expect(schema.additionalProperties).toBe(false);
    expect(schema.required).toEqual(['to_addrs', 'subject', 'body']);
    expect(schema.properties).toMatchObject({
      to_addrs: { type: 'array', items: { type: 'string' } },
      attachment_path: { type: ['string', 'null'] },
      attachment_paths: { type: ['array', 'null'], items: { type: 'string' } },
    });
  });

  it('describes parameters for the deliberation prompt', () => {
    const text = describeTools();
    expect(text).toContain('Tool: process_email_and_label');
    expect(text).toContain('      - to_addrs (array<string>, required): Recipient email addresses, in order. At least one.');
    expect(text).toContain('      - attachment_path (string, optional): Path of a single file to attach.');
    expect(text).toContain('Tool: end_execution_loop');
  });
});
