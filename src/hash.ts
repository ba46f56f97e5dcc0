import crypto from 'node:crypto';
import type { ExpandedEvent } from './types.js';

// Two events are the same airing when title and start instant match,
// whichever feed they came from.
export function dedupeKey(e: Pick<ExpandedEvent, 'summary' | 'start'>): string {
  const canonical = JSON.stringify({
    title: e.summary.trim(),
    starts_at: e.start.toISOString(),
  });
  return crypto.createHash('sha256').update(canonical).digest('hex');
}
