import { describe, it, expect, vi } from 'vitest';
import type { DuplicatePolicy } from '../../src/core/config.js';
import { planDuplicateRemoval, removeDuplicates } from '../../src/maintenance/duplicates.js';
import type { DrawRecord } from '../../src/types/domain.js';
import { createMemoryStores, draw } from '../helpers/memoryStores.js';

function record(id: string, createdAtSeconds: number, extra: Partial<DrawRecord> = {}): DrawRecord {
  return {
    ...draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 6]),
    id,
    createdAt: new Date(createdAtSeconds * 1000),
    ...extra
  };
}

describe('duplicate removal', () => {
  describe('planDuplicateRemoval', () => {
    // Store order; the first member is not the earliest ingested
    const group = [record('a', 20), record('b', 10), record('c', 30)];

    it.each<{ policy: DuplicatePolicy; keep: string; remove: string[] }>([
      { policy: 'first-seen', keep: 'a', remove: ['b', 'c'] },
      { policy: 'earliest-ingested', keep: 'b', remove: ['a', 'c'] },
      { policy: 'latest-ingested', keep: 'c', remove: ['a', 'b'] }
    ])('should keep the $policy record', ({ policy, keep, remove }) => {
      const plan = planDuplicateRemoval(group, { policy, onConflict: 'skip' });

      expect(plan.resolved).toHaveLength(1);
      expect(plan.resolved[0].keep.id).toBe(keep);
      expect(plan.removeIds).toEqual(remove);
    });

    it('should give ties to the earlier record', () => {
      const tied = [record('a', 10), record('b', 10)];

      expect(planDuplicateRemoval(tied, { policy: 'latest-ingested', onConflict: 'skip' }).resolved[0].keep.id).toBe('a');
    });

    it('should leave conflicting groups alone unless told to resolve them', () => {
      const conflicting = [record('a', 10), record('b', 20, { jackpot: 1000 })];

      const skipped = planDuplicateRemoval(conflicting, { policy: 'first-seen', onConflict: 'skip' });
      const resolved = planDuplicateRemoval(conflicting, { policy: 'first-seen', onConflict: 'resolve' });

      expect(skipped.skipped.map(g => g.key)).toEqual(['2024-02-01|']);
      expect(skipped.removeIds).toEqual([]);
      expect(resolved.resolved[0].conflict).toBe(true);
      expect(resolved.removeIds).toEqual(['b']);
    });

    it('should not group draws with different draw numbers', () => {
      const plan = planDuplicateRemoval(
        [record('a', 10, { drawNumber: '1' }), record('b', 20, { drawNumber: '2' })],
        { policy: 'first-seen', onConflict: 'skip' }
      );

      expect(plan).toEqual({ resolved: [], skipped: [], removeIds: [] });
    });
  });

  describe('removeDuplicates', () => {
    it('should delete the extra records and report counts', async () => {
      const stores = createMemoryStores();
      const [original] = await stores.draws.insertDraws('lotto_6_42', [draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 6])]);
      await stores.draws.insertDraws('lotto_6_42', [
        draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 6]),
        draw('lotto_6_42', '2024-02-03', [7, 8, 9, 10, 11, 12])
      ]);

      const reports = await removeDuplicates(['lotto_6_42'], stores, { policy: 'first-seen', onConflict: 'skip' });

      expect(reports).toEqual([{
        gameId: 'lotto_6_42',
        before: 3,
        duplicateGroups: 1,
        conflictsSkipped: 0,
        removed: 1,
        after: 2
      }]);
      expect(stores.drawRows.map(d => d.id)).toContain(original.id);
    });

    it('should delete in batches', async () => {
      const stores = createMemoryStores();
      await stores.draws.insertDraws(
        'lotto_6_42',
        Array.from({ length: 250 }, () => draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 6]))
      );
      const deleteDraws = vi.spyOn(stores.draws, 'deleteDraws');

      const [report] = await removeDuplicates(['lotto_6_42'], stores, { policy: 'first-seen', onConflict: 'skip' });

      expect(deleteDraws.mock.calls.map(([, ids]) => ids.length)).toEqual([100, 100, 49]);
      expect(report).toMatchObject({ before: 250, removed: 249, after: 1 });
    });

    it('should report conflicts it skipped', async () => {
      const stores = createMemoryStores();
      await stores.draws.insertDraws('lotto_6_42', [draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 6])]);
      await stores.draws.insertDraws('lotto_6_42', [draw('lotto_6_42', '2024-02-01', [1, 2, 3, 4, 5, 7])]);

      const [report] = await removeDuplicates(['lotto_6_42'], stores, { policy: 'first-seen', onConflict: 'skip' });

      expect(report).toEqual({
        gameId: 'lotto_6_42',
        before: 2,
        duplicateGroups: 1,
        conflictsSkipped: 1,
        removed: 0,
        after: 2
      });
    });
  });
});
