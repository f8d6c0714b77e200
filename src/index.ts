/**
 * @fileoverview Public entry point for the outreach drafting agent.
 *
 * Callers normally use `createOutreachAgent()` for a production-wired agent,
 * or construct `OutreachAgent` with their own collaborators.
 */

export { OutreachAgent, createOutreachAgent } from './orchestrator/index.js';
export type { OutreachAgentOptions } from './orchestrator/index.js';

export { DraftComposer, DRAFT_SAVED_STATUS } from './domains/outreach/service/composer.js';
export type { ComposeOutcome, DraftComposerOptions } from './domains/outreach/service/composer.js';
export { resolveAttachments } from './domains/outreach/service/attachments.js';
export { buildDraftLabel } from './domains/outreach/service/labels.js';
export { processRecipients, personalizePrompt } from './domains/outreach/service/batch.js';
export type { BatchOptions, BatchSummary, OutreachRunner } from './domains/outreach/service/batch.js';
export { GmailDraftTransport, createGmailTransport } from './domains/outreach/providers/gmail.js';
export {
  OUTREACH_TOOLS,
  parseToolCall,
  validateProcessEmailArgs,
} from './domains/outreach/runtime/tools.js';
export type { ToolCall } from './domains/outreach/runtime/tools.js';

export {
  SchemaError,
  AttachmentError,
  TransportFailure,
  ComposeError,
  DeliberationError,
} from './domains/outreach/errors.js';

export { systemClock, succeeded, failed } from './domains/outreach/types.js';
export type {
  AttachmentHandle,
  AttachmentSet,
  Clock,
  DraftTransport,
  EmailDraft,
  ExecutionResult,
  ValidatedArgs,
} from './domains/outreach/types.js';

export { default as config, validateConfig } from './config.js';
