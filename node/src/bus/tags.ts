import type { Stage, SubtaskTag } from './types';

const LEGACY_DELIMITER = '__';

export function createTag(sessionKey: string, turnId: number, stage: Stage, index = 0): SubtaskTag {
  return { sessionKey, turnId, stage, index };
}

/** Stable identity of a sub-task slot, used for duplicate detection. */
export function tagKey(tag: SubtaskTag): string {
  return `${tag.sessionKey}#${tag.turnId}:${tag.stage}:${tag.index}`;
}

/**
 * Delimiter-joined "base__index" form used in log lines.
 * Carries only the session and index.
 */
export function formatLegacyTag(tag: SubtaskTag): string {
  return `${tag.sessionKey}${LEGACY_DELIMITER}${tag.index}`;
}
