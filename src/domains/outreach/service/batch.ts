/**
 * Batch outreach processor.
 *
 * Walks recipient files `customer_<i>.json` for i in [begin, end), runs one
 * fresh agent per recipient and marks successful recipients as drafted.
 * Recipients are handled one at a time.
 */

import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ExecutionResult } from '../types.js';
import { errorMessage } from '../../../utils/errors.js';
import type { Result } from '../../../utils/errors.js';
import { isRecord } from '../../../tools/utils.js';
import { createLogger, redactEmail, withRunContext } from '../../../utils/observability/index.js';
import type { AppLogger } from '../../../utils/observability/index.js';

/** Placeholder the template carries where the recipient JSON goes. */
export const RECIPIENT_PLACEHOLDER = '{Insert JSON Here}';

export type Recipient = Record<string, unknown>;

/** Anything that can run one outreach task. */
export interface OutreachRunner {
  run(taskPrompt: string): Promise<ExecutionResult>;
}

export interface BatchOptions {
  /** Directory holding `customer_<i>.json` files */
  dir: string;
  /** First index, inclusive */
  begin: number;
  /** Last index, exclusive */
  end: number;
  template: string;
  /** Called once per recipient; every recipient gets a new agent */
  agentFactory: () => OutreachRunner;
  logger?: AppLogger;
}

export interface BatchSummary {
  /** Recipients an agent was run for */
  processed: number;
  drafted: number;
  failed: number;
  /** Missing, unreadable or already handled */
  skipped: number;
}

export function recipientFilePath(dir: string, index: number): string {
  return join(dir, `customer_${index}.json`);
}

export function personalizePrompt(template: string, recipient: Recipient): string {
  return template.split(RECIPIENT_PLACEHOLDER).join(JSON.stringify(recipient, null, 2));
}

function isHandled(recipient: Recipient): boolean {
  return recipient.email_sent === true || recipient.draft_saved === true;
}

async function loadRecipient(filePath: string): Promise<Result<Recipient>> {
  try {
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    if (!isRecord(parsed)) {
      return { success: false, error: 'Recipient file must contain a JSON object' };
    }
    return { success: true, data: parsed };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

/**
 * Run the agent over a slice of recipient files.
 */
export async function processRecipients(options: BatchOptions): Promise<BatchSummary> {
  return withRunContext('batchId', () => processSlice(options));
}

async function processSlice(options: BatchOptions): Promise<BatchSummary> {
  const logger = options.logger ?? createLogger({ domain: 'outreach-batch' });
  const summary: BatchSummary = { processed: 0, drafted: 0, failed: 0, skipped: 0 };

  logger.info('batch_started', { dir: options.dir, begin: options.begin, end: options.end });

  for (let index = options.begin; index < options.end; index++) {
    const filePath = recipientFilePath(options.dir, index);

    if (!existsSync(filePath)) {
      logger.info('recipient_missing', { index, filePath });
      summary.skipped++;
      continue;
    }

    const loaded = await loadRecipient(filePath);
    if (!loaded.success) {
      logger.error('recipient_load_failed', { index, filePath, error: loaded.error });
      summary.skipped++;
      continue;
    }

    const recipient = loaded.data;
    if (isHandled(recipient)) {
      logger.info('recipient_already_handled', { index });
      summary.skipped++;
      continue;
    }

    const email = typeof recipient.email === 'string' ? redactEmail(recipient.email) : undefined;
    logger.info('recipient_processing', { index, email });

    summary.processed++;
    const result = await options.agentFactory().run(personalizePrompt(options.template, recipient));

    if (result.error !== null) {
      logger.warn('recipient_failed', { index, error: result.error });
      summary.failed++;
      continue;
    }

    summary.drafted++;
    logger.info('recipient_drafted', { index, status: result.status });

    try {
      await writeFile(filePath, `${JSON.stringify({ ...recipient, draft_saved: true }, null, 4)}\n`, 'utf-8');
    } catch (error) {
      // The draft exists; only the bookkeeping is lost.
      logger.error('recipient_update_failed', { index, error: errorMessage(error) });
    }
  }

  logger.info('batch_finished', { ...summary });
  return summary;
}
