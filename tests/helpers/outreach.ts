/**
 * Shared fakes for outreach tests.
 */

import { vi } from 'vitest';
import type { Clock, DraftTransport } from '../../src/domains/outreach/types.js';

/**
 * In-memory DraftTransport. Draft ids count up from `draft-1`.
 */
export function createFakeTransport() {
  let counter = 0;
  const transport = {
    createDraft: vi.fn(async (_raw: string) => {
      counter++;
      return `draft-${counter}`;
    }),
    applyLabel: vi.fn(async (_draftId: string, _label: string) => {}),
    discardDraft: vi.fn(async (_draftId: string) => {}),
  } satisfies DraftTransport;
  return transport;
}

export type FakeTransport = ReturnType<typeof createFakeTransport>;

export function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso) };
}
