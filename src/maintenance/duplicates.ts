/**
 * Duplicate Draw Removal
 *
 * Collapses stored draws that share a composite key, keeping one record per
 * key. Which record survives is chosen by policy; groups whose members
 * disagree on their numbers, jackpot or winners are conflicts and are left
 * alone unless `onConflict` is 'resolve'.
 */

import { BATCH } from '../core/constants.js';
import type { ConflictMode, DuplicatePolicy } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { GameId } from '../core/games.js';
import type { DrawStore } from '../db/repositories/drawResults.js';
import { compositeKey } from '../ingest/dedupFilter.js';
import type { DrawRecord } from '../types/domain.js';

export interface DedupeOptions {
  policy: DuplicatePolicy;
  onConflict: ConflictMode;
}

export interface DuplicateGroup {
  key: string;
  keep: DrawRecord;
  remove: DrawRecord[];
  conflict: boolean;
}

export interface RemovalPlan {
  /** Groups that will be collapsed */
  resolved: DuplicateGroup[];
  /** Conflicting groups left untouched */
  skipped: DuplicateGroup[];
  removeIds: string[];
}

function sameContent(a: DrawRecord, b: DrawRecord): boolean {
  return (
    a.numbers.length === b.numbers.length &&
    a.numbers.every((n, i) => n === b.numbers[i]) &&
    a.jackpot === b.jackpot &&
    a.winners === b.winners
  );
}

/**
 * Picks the surviving record of a group; ties go to the earlier record
 */
function chooseKeeper(group: readonly DrawRecord[], policy: DuplicatePolicy): DrawRecord {
  const [first, ...rest] = group;
  switch (policy) {
    case 'first-seen':
      return first;
    case 'earliest-ingested':
      return rest.reduce((keep, d) => (d.createdAt.getTime() < keep.createdAt.getTime() ? d : keep), first);
    case 'latest-ingested':
      return rest.reduce((keep, d) => (d.createdAt.getTime() > keep.createdAt.getTime() ? d : keep), first);
  }
}

/**
 * Plans which records to delete; `draws` are in store order
 */
export function planDuplicateRemoval(draws: readonly DrawRecord[], options: DedupeOptions): RemovalPlan {
  const groups = new Map<string, DrawRecord[]>();
  for (const draw of draws) {
    const key = compositeKey(draw);
    const group = groups.get(key);
    if (group) {
      group.push(draw);
    } else {
      groups.set(key, [draw]);
    }
  }

  const plan: RemovalPlan = { resolved: [], skipped: [], removeIds: [] };
  for (const [key, members] of groups) {
    if (members.length < 2) continue;

    const keep = chooseKeeper(members, options.policy);
    const conflict = members.some(d => !sameContent(d, members[0]));
    const group: DuplicateGroup = { key, keep, remove: members.filter(d => d !== keep), conflict };

    if (conflict && options.onConflict === 'skip') {
      plan.skipped.push(group);
      continue;
    }
    plan.resolved.push(group);
    plan.removeIds.push(...group.remove.map(d => d.id));
  }

  return plan;
}

export interface DedupeReport {
  gameId: GameId;
  before: number;
  duplicateGroups: number;
  conflictsSkipped: number;
  removed: number;
  after: number;
}

/**
 * Removes duplicate draws of each game, deleting in batches
 */
export async function removeDuplicates(
  gameIds: readonly GameId[],
  deps: { draws: Pick<DrawStore, 'getAllDraws' | 'deleteDraws'> },
  options: DedupeOptions
): Promise<DedupeReport[]> {
  const reports: DedupeReport[] = [];

  for (const gameId of gameIds) {
    const draws = await deps.draws.getAllDraws(gameId);
    const plan = planDuplicateRemoval(draws, options);

    for (const group of plan.skipped) {
      logger.warn(
        { gameId, key: group.key, ids: [group.keep, ...group.remove].map(d => d.id) },
        'Duplicate group has conflicting content; left untouched'
      );
    }

    let removed = 0;
    for (let i = 0; i < plan.removeIds.length; i += BATCH.DELETE_IDS) {
      removed += await deps.draws.deleteDraws(gameId, plan.removeIds.slice(i, i + BATCH.DELETE_IDS));
    }

    const after = removed > 0 ? (await deps.draws.getAllDraws(gameId)).length : draws.length;
    const report: DedupeReport = {
      gameId,
      before: draws.length,
      duplicateGroups: plan.resolved.length + plan.skipped.length,
      conflictsSkipped: plan.skipped.length,
      removed,
      after
    };
    logger.info(report, 'Duplicate removal finished');
    reports.push(report);
  }

  return reports;
}
