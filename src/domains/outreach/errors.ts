/**
 * @fileoverview Outreach error taxonomy.
 *
 * Every class extends AppError so callers can read `code` uniformly. The
 * execution phase turns all of these into an ExecutionResult error string.
 */

import { AppError } from '../../utils/errors.js';

export type SchemaErrorKind =
  | 'UnknownTool'
  | 'UnknownProperty'
  | 'MissingRequired'
  | 'TypeMismatch'
  | 'InvalidValue';

/** Malformed tool call. */
export class SchemaError extends AppError {
  constructor(
    public readonly kind: SchemaErrorKind,
    message: string,
    public readonly field?: string,
  ) {
    super(message, `SCHEMA_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, false, field ? { field } : undefined);
    this.name = 'SchemaError';
  }
}

/** Attachment path that does not resolve to a readable file. */
export class AttachmentError extends AppError {
  public readonly kind = 'NotFound' as const;

  constructor(public readonly path: string, cause?: string) {
    super(`Attachment not found: ${path}`, 'ATTACHMENT_NOT_FOUND', false, cause ? { cause } : undefined);
    this.name = 'AttachmentError';
  }
}

/** Draft-persistence collaborator unavailable or rejected the request. */
export class TransportFailure extends AppError {
  constructor(message: string, public readonly operation: 'createDraft' | 'applyLabel' | 'discardDraft' | 'resolveLabel') {
    super(message, 'TRANSPORT_FAILURE', true, { operation });
    this.name = 'TransportFailure';
  }
}

export type ComposeErrorKind = 'TransportFailure' | 'AttachmentFailure';

/** Draft composition failed; no labeled draft was left behind. */
export class ComposeError extends AppError {
  constructor(
    public readonly kind: ComposeErrorKind,
    message: string,
  ) {
    super(message, kind === 'TransportFailure' ? 'COMPOSE_TRANSPORT_FAILURE' : 'COMPOSE_ATTACHMENT_FAILURE');
    this.name = 'ComposeError';
  }
}

/** Completion service failed during the deliberation phase. */
export class DeliberationError extends AppError {
  constructor(message: string) {
    super(message, 'DELIBERATION_FAILED', true);
    this.name = 'DeliberationError';
  }
}
