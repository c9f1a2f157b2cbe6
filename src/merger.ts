import type { EngineOutcome, NormalizedResult, SourceItem } from "./types.js";

/** Answer, images and sources combined from several engine results. */
export interface MergedSources {
  readonly sources: SourceItem[];
  readonly answer: string | null;
  readonly images: string[];
}

/**
 * Round-robin interleave of ranked source lists. Lists are visited in the
 * given order and each turn emits at most one item per list: a URL already
 * emitted (exact, case-sensitive match) is passed over and the same list
 * moves on to its next item, so the first list to surface a URL keeps its
 * copy without losing its turn. `limit` caps the output; `null` means
 * unlimited.
 */
export function mergeSources(lists: ReadonlyArray<readonly SourceItem[]>, limit: number | null = null): SourceItem[] {
  const merged: SourceItem[] = [];
  if (limit !== null && limit <= 0) {
    return merged;
  }

  const emitted = new Set<string>();
  const cursors = lists.map(() => 0);
  let emittedThisRound = true;

  while (emittedThisRound) {
    emittedThisRound = false;
    for (let index = 0; index < lists.length; index += 1) {
      const list = lists[index];
      let cursor = cursors[index];
      while (cursor < list.length && emitted.has(list[cursor].url)) {
        cursor += 1;
      }
      cursors[index] = cursor;
      if (cursor >= list.length) {
        continue;
      }

      const item = list[cursor];
      cursors[index] = cursor + 1;
      emittedThisRound = true;
      emitted.add(item.url);
      merged.push(item);
      if (limit !== null && merged.length >= limit) {
        return merged;
      }
    }
  }
  return merged;
}

/**
 * Merges engine outcomes ordered by configuration order. Outcomes without a
 * result are discarded; `answer` and `images` come from the first engine that
 * produced a non-empty value.
 */
export function mergeOutcomes(outcomes: readonly EngineOutcome[], limit: number | null = null): MergedSources {
  const results = outcomes
    .map((outcome) => outcome.result)
    .filter((result): result is NormalizedResult => result !== null);

  const answer = results.find((result) => result.answer !== null && result.answer.trim().length > 0)?.answer ?? null;
  const images = results.find((result) => result.images.length > 0)?.images ?? [];

  return {
    sources: mergeSources(
      results.map((result) => result.sources),
      limit,
    ),
    answer,
    images: [...images],
  };
}
