/**
 * @fileoverview Gmail draft transport.
 *
 * Persists drafts and applies labels through the Gmail API. Auth uses an
 * OAuth2 refresh token from configuration; obtaining that token is outside
 * this project.
 *
 * Every Gmail API failure surfaces as TransportFailure. Nothing here retries:
 * a failed call ends the composing step.
 */

import { google } from 'googleapis';
import type { gmail_v1 } from 'googleapis';
import config from '../../../config.js';
import { TransportFailure } from '../errors.js';
import type { DraftTransport } from '../types.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';

/**
 * Create an OAuth2 client from the configured refresh token.
 */
function createOAuth2Client() {
  const { clientId, clientSecret, refreshToken } = config.google;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new TransportFailure(
      'Gmail credentials incomplete. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, and GOOGLE_REFRESH_TOKEN.',
      'createDraft'
    );
  }
  const oauth2Client = new google.auth.OAuth2(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

export class GmailDraftTransport implements DraftTransport {
  /** Label name → label id, filled lazily */
  private readonly labelIds = new Map<string, string>();
  /** Draft id → underlying message id, recorded at creation */
  private readonly messageIds = new Map<string, string>();
  private readonly logger: AppLogger;

  constructor(private readonly gmail: gmail_v1.Gmail, logger?: AppLogger) {
    this.logger = logger ?? createLogger({ domain: 'gmail-transport' });
  }

  async createDraft(raw: string): Promise<string> {
    let draft: gmail_v1.Schema$Draft;
    try {
      const response = await this.gmail.users.drafts.create({
        userId: 'me',
        requestBody: { message: { raw } },
      });
      draft = response.data;
    } catch (error) {
      throw new TransportFailure(`Gmail rejected draft: ${errorMessage(error)}`, 'createDraft');
    }

    if (!draft.id) {
      throw new TransportFailure('Gmail returned a draft without an id', 'createDraft');
    }
    if (draft.message?.id) {
      this.messageIds.set(draft.id, draft.message.id);
    }

    this.logger.debug('gmail_draft_created', { draftId: draft.id });
    return draft.id;
  }

  async applyLabel(draftId: string, label: string): Promise<void> {
    const labelId = await this.resolveLabelId(label);
    const messageId = await this.resolveMessageId(draftId);

    try {
      await this.gmail.users.messages.modify({
        userId: 'me',
        id: messageId,
        requestBody: { addLabelIds: [labelId] },
      });
    } catch (error) {
      throw new TransportFailure(`Gmail rejected label "${label}": ${errorMessage(error)}`, 'applyLabel');
    }

    this.logger.debug('gmail_label_applied', { draftId, labelId });
  }

  async discardDraft(draftId: string): Promise<void> {
    try {
      await this.gmail.users.drafts.delete({ userId: 'me', id: draftId });
    } catch (error) {
      throw new TransportFailure(`Gmail could not delete draft ${draftId}: ${errorMessage(error)}`, 'discardDraft');
    }
    this.messageIds.delete(draftId);
  }

  private async resolveMessageId(draftId: string): Promise<string> {
    const known = this.messageIds.get(draftId);
    if (known) return known;

    try {
      const response = await this.gmail.users.drafts.get({ userId: 'me', id: draftId, format: 'minimal' });
      const messageId = response.data.message?.id;
      if (!messageId) {
        throw new Error('draft has no message');
      }
      this.messageIds.set(draftId, messageId);
      return messageId;
    } catch (error) {
      throw new TransportFailure(`Could not load draft ${draftId}: ${errorMessage(error)}`, 'applyLabel');
    }
  }

  /**
   * Find a user label by name, creating it when missing.
   */
  private async resolveLabelId(name: string): Promise<string> {
    const cached = this.labelIds.get(name);
    if (cached) return cached;

    try {
      const listed = await this.gmail.users.labels.list({ userId: 'me' });
      const existing = listed.data.labels?.find((l) => l.name === name);
      if (existing?.id) {
        this.labelIds.set(name, existing.id);
        return existing.id;
      }

      const created = await this.gmail.users.labels.create({
        userId: 'me',
        requestBody: {
          name,
          labelListVisibility: 'labelShow',
          messageListVisibility: 'show',
        },
      });
      if (!created.data.id) {
        throw new Error('label created without an id');
      }
      this.logger.info('gmail_label_created', { label: name });
      this.labelIds.set(name, created.data.id);
      return created.data.id;
    } catch (error) {
      throw new TransportFailure(`Could not resolve label "${name}": ${errorMessage(error)}`, 'resolveLabel');
    }
  }
}

/**
 * Build a transport against the configured Gmail account.
 */
export function createGmailTransport(logger?: AppLogger): GmailDraftTransport {
  const gmail = google.gmail({ version: 'v1', auth: createOAuth2Client() });
  return new GmailDraftTransport(gmail, logger);
}
