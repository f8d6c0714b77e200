/**
 * Draft label naming.
 *
 * Labels are `<base>/<YYYY-MM-DD>` using the UTC date of the injected clock,
 * which Gmail shows as a nested label under `<base>`. The name depends only
 * on configuration and the clock, never on what the model asked for.
 */

import type { Clock } from '../types.js';

export function buildDraftLabel(base: string, clock: Clock): string {
  const trimmed = base.trim().replace(/\/+$/, '');
  if (!trimmed) {
    throw new Error('Label base must not be blank');
  }
  const date = clock.now().toISOString().slice(0, 10);
  return `${trimmed}/${date}`;
}
