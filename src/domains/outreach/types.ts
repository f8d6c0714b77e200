/**
 * @fileoverview Outreach domain type definitions.
 */

/**
 * A file resolved for attachment: absolute path plus the metadata the MIME
 * encoder needs.
 */
export interface AttachmentHandle {
  /** Normalized absolute path */
  path: string;
  /** Basename used as the attachment filename */
  filename: string;
  contentType: string;
  sizeBytes: number;
}

/** Ordered, deduplicated attachments (single path first, then list order). */
export type AttachmentSet = readonly AttachmentHandle[];

/**
 * Arguments of `process_email_and_label` after validation.
 */
export interface ValidatedArgs {
  toAddrs: string[];
  subject: string;
  body: string;
  attachmentPath: string | null;
  attachmentPaths: string[] | null;
}

/**
 * An email artifact persisted as a labeled draft.
 * Frozen once the transport has accepted it.
 */
export interface EmailDraft {
  readonly draftId: string;
  readonly recipients: readonly string[];
  readonly subject: string;
  /** HTML body */
  readonly body: string;
  readonly attachments: AttachmentSet;
  readonly label: string;
}

/**
 * Input to the MIME encoder.
 */
export interface MimeMessageInput {
  from?: string;
  to: readonly string[];
  subject: string;
  html: string;
  attachments: ReadonlyArray<AttachmentHandle & { content: Buffer }>;
}

/**
 * Draft-persistence collaborator.
 *
 * `createDraft` is a single atomic call: it either returns the id of a saved
 * draft or throws. `applyLabel` tags the draft's message with a label name,
 * creating the label when needed. `discardDraft` removes a draft that could
 * not be labeled.
 */
export interface DraftTransport {
  createDraft(raw: string): Promise<string>;
  applyLabel(draftId: string, label: string): Promise<void>;
  discardDraft(draftId: string): Promise<void>;
}

/** Source of the current time; injected so tests can pin the date. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Terminal artifact of a run. Exactly one of `status` and `error` is set.
 */
export type ExecutionResult =
  | { status: string; error: null }
  | { status: null; error: string };

export function succeeded(status: string): ExecutionResult {
  return { status, error: null };
}

export function failed(error: string): ExecutionResult {
  return { status: null, error };
}
