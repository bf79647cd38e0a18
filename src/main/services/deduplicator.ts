/**
 * Deduplicator — decides what a freshly classified candidate does to history.
 *
 * Pure: the store looks up the relevant rows and applies the decision inside
 * one transaction.
 */

import type { ClipCandidate, ClipItem } from '@shared/types';

export interface DedupContext {
  /** Item with the highest lastUsedAt, pinned or not */
  mostRecent: ClipItem | null;
  /** Unpinned item with the candidate's fingerprint, if any */
  unpinnedMatch: ClipItem | null;
  /** Pinned item with the candidate's fingerprint, if any */
  pinnedMatch: ClipItem | null;
}

export type DedupDecision =
  /** Same content as the top of history (or a pinned copy): bump lastUsedAt only */
  | { action: 'touch'; id: number }
  /** Re-copy of an older unpinned item: delete it and insert a fresh row */
  | { action: 'promote'; staleId: number }
  | { action: 'insert' };

export function decideDedup(candidate: ClipCandidate, ctx: DedupContext): DedupDecision {
  const fp = candidate.fingerprint;

  if (ctx.mostRecent && ctx.mostRecent.fingerprint === fp) {
    return { action: 'touch', id: ctx.mostRecent.id };
  }

  if (ctx.unpinnedMatch && ctx.unpinnedMatch.fingerprint === fp) {
    return { action: 'promote', staleId: ctx.unpinnedMatch.id };
  }

  // Pinned items keep their identity and pin state
  if (ctx.pinnedMatch && ctx.pinnedMatch.fingerprint === fp) {
    return { action: 'touch', id: ctx.pinnedMatch.id };
  }

  return { action: 'insert' };
}
