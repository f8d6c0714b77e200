/**
 * Draft Composer
 *
 * Builds an EmailDraft from validated tool arguments and persists it as a
 * labeled draft:
 * 1. Resolve attachments (AttachmentFailure on any missing file)
 * 2. Name the label from config + clock
 * 3. Encode the MIME message and create the draft (exactly one transport call)
 * 4. Apply the label; if that fails, discard the draft so none is left unlabeled
 */

import { readFile } from 'fs/promises';
import { AttachmentError, ComposeError } from '../errors.js';
import type {
  AttachmentSet,
  Clock,
  DraftTransport,
  EmailDraft,
  ValidatedArgs,
} from '../types.js';
import { resolveAttachments } from './attachments.js';
import { buildDraftLabel } from './labels.js';
import { encodeMimeMessage } from './mime.js';
import { createLogger, redactEmail } from '../../../utils/observability/index.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';

export const DRAFT_SAVED_STATUS = 'Draft saved and labeled successfully.';

export interface DraftComposerOptions {
  transport: DraftTransport;
  clock: Clock;
  labelBase: string;
  /** From header; Gmail fills in the account address when omitted */
  sender?: string;
  attachmentsBaseDir?: string;
  logger?: AppLogger;
}

export interface ComposeOutcome {
  status: string;
  draft: EmailDraft;
}

export class DraftComposer {
  private readonly logger: AppLogger;

  constructor(private readonly options: DraftComposerOptions) {
    this.logger = options.logger ?? createLogger({ domain: 'outreach-composer' });
  }

  /**
   * @throws ComposeError (`AttachmentFailure` or `TransportFailure`)
   */
  async composeAndLabel(args: ValidatedArgs): Promise<ComposeOutcome> {
    const attachments = await this.resolve(args);
    const label = buildDraftLabel(this.options.labelBase, this.options.clock);

    let raw: string;
    try {
      const loaded = await Promise.all(attachments.map(async (handle) => ({
        ...handle,
        content: await readFile(handle.path),
      })));
      raw = encodeMimeMessage({
        from: this.options.sender,
        to: args.toAddrs,
        subject: args.subject,
        html: args.body,
        attachments: loaded,
      });
    } catch (error) {
      throw new ComposeError('AttachmentFailure', `Failed to read attachment: ${errorMessage(error)}`);
    }

    let draftId: string;
    try {
      draftId = await this.options.transport.createDraft(raw);
    } catch (error) {
      this.logger.error('draft_create_failed', { error: errorMessage(error) });
      throw new ComposeError('TransportFailure', `Failed to save draft: ${errorMessage(error)}`);
    }

    try {
      await this.options.transport.applyLabel(draftId, label);
    } catch (error) {
      this.logger.error('draft_label_failed', { draftId, label, error: errorMessage(error) });
      await this.discard(draftId);
      throw new ComposeError('TransportFailure', `Failed to label draft: ${errorMessage(error)}`);
    }

    const draft: EmailDraft = Object.freeze({
      draftId,
      recipients: Object.freeze([...args.toAddrs]),
      subject: args.subject,
      body: args.body,
      attachments,
      label,
    });

    this.logger.info('draft_saved', {
      draftId,
      label,
      recipientDomains: args.toAddrs.map((addr) => redactEmail(addr)),
      attachmentCount: attachments.length,
    });

    return { status: DRAFT_SAVED_STATUS, draft };
  }

  private async resolve(args: ValidatedArgs): Promise<AttachmentSet> {
    try {
      return Object.freeze(await resolveAttachments(args.attachmentPath, args.attachmentPaths, {
        baseDir: this.options.attachmentsBaseDir,
      }));
    } catch (error) {
      if (error instanceof AttachmentError) {
        this.logger.warn('attachment_not_found', { attachmentPath: error.path });
        throw new ComposeError('AttachmentFailure', error.message);
      }
      throw error;
    }
  }

  private async discard(draftId: string): Promise<void> {
    try {
      await this.options.transport.discardDraft(draftId);
    } catch (error) {
      // The original labeling error is what the caller sees.
      this.logger.error('draft_discard_failed', { draftId, error: errorMessage(error) });
    }
  }
}
