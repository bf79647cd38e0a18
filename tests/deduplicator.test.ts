import { describe, it, expect } from 'vitest';
import { decideDedup } from '../src/main/services/deduplicator';
import type { ClipCandidate, ClipItem } from '../src/shared/types';

function item(id: number, fingerprint: string, pinned = false): ClipItem {
  return {
    id,
    kind: 'text',
    payload: { kind: 'text', text: fingerprint },
    fingerprint,
    preview: fingerprint,
    createdAt: id,
    lastUsedAt: id,
    pinned,
  };
}

const candidate: ClipCandidate = { payload: { kind: 'text', text: 'fp' }, fingerprint: 'fp', preview: 'fp' };

describe('decideDedup', () => {
  it('inserts new content', () => {
    expect(decideDedup(candidate, { mostRecent: item(1, 'other'), unpinnedMatch: null, pinnedMatch: null })).toEqual({
      action: 'insert',
    });
  });

  it('inserts into an empty history', () => {
    expect(decideDedup(candidate, { mostRecent: null, unpinnedMatch: null, pinnedMatch: null })).toEqual({ action: 'insert' });
  });

  it('touches the most recent item on a repeated copy', () => {
    const top = item(4, 'fp');
    expect(decideDedup(candidate, { mostRecent: top, unpinnedMatch: top, pinnedMatch: null })).toEqual({
      action: 'touch',
      id: 4,
    });
  });

  it('touches a pinned most recent item rather than promoting', () => {
    const pinned = item(2, 'fp', true);
    expect(decideDedup(candidate, { mostRecent: pinned, unpinnedMatch: null, pinnedMatch: pinned })).toEqual({
      action: 'touch',
      id: 2,
    });
  });

  it('promotes an older unpinned match', () => {
    expect(
      decideDedup(candidate, { mostRecent: item(9, 'other'), unpinnedMatch: item(3, 'fp'), pinnedMatch: null }),
    ).toEqual({ action: 'promote', staleId: 3 });
  });

  it('touches an older pinned match when no unpinned copy exists', () => {
    expect(
      decideDedup(candidate, { mostRecent: item(9, 'other'), unpinnedMatch: null, pinnedMatch: item(5, 'fp', true) }),
    ).toEqual({ action: 'touch', id: 5 });
  });

  it('prefers promoting the unpinned copy over touching the pinned one', () => {
    expect(
      decideDedup(candidate, {
        mostRecent: item(9, 'other'),
        unpinnedMatch: item(3, 'fp'),
        pinnedMatch: item(5, 'fp', true),
      }),
    ).toEqual({ action: 'promote', staleId: 3 });
  });
});
