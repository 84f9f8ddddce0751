/**
 * Key-pattern abstraction for object properties
 *
 * Sibling keys that share a recognized date pattern are collapsed into one
 * placeholder slot named from the pattern and the nesting depth, so that
 * `{"2021-08-24": ..., "2021-08-25": ...}` infers a single property.
 *
 * @module lib/inferencer/key-grouper
 */

import type { DateFormatToken } from "../../types/date-patterns.js";
import type { InferenceOptions } from "../../types/options.js";
import { recognizeDatePattern } from "../../utils/date-patterns.js";

export type KeyGroupingOptions = Pick<
  InferenceOptions,
  "abstractDateKeys" | "minKeyGroupSize" | "placeholderTemplate"
>;

/**
 * One property of the inferred object and the source keys feeding it
 */
export interface KeySlot {
  /** Property name in the schema: the key itself, or a placeholder */
  name: string;

  /** Pattern shared by the grouped keys; absent for ordinary keys */
  pattern?: DateFormatToken;

  /** Source keys, in document order */
  keys: string[];

  /** Positions of `keys` in the object's entry list */
  indices: number[];
}

/**
 * Substitute pattern and depth into the placeholder template
 *
 * @example
 * formatPlaceholderName("{pattern}_{depth}", "yyyy-mm-dd", 2); // "yyyy-mm-dd_2"
 */
export function formatPlaceholderName(
  template: string,
  pattern: DateFormatToken,
  depth: number,
): string {
  return template
    .replaceAll("{pattern}", pattern)
    .replaceAll("{depth}", String(depth));
}

/**
 * Count keys per recognized pattern
 */
export function countKeyPatterns(
  patterns: readonly (DateFormatToken | undefined)[],
): Map<DateFormatToken, number> {
  const counts = new Map<DateFormatToken, number>();
  for (const pattern of patterns) {
    if (pattern !== undefined) {
      counts.set(pattern, (counts.get(pattern) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Assign each key of one object to a property slot
 *
 * Slots keep the order in which their first key appears. A pattern group
 * smaller than `minKeyGroupSize` keeps its keys as ordinary properties; with
 * the default of 1 even a lone date-shaped key becomes a placeholder.
 *
 * @param keys - The object's keys in entry order
 * @param depth - Nesting depth of these keys (1 for the root's own keys)
 */
export function groupObjectKeys(
  keys: readonly string[],
  depth: number,
  options: KeyGroupingOptions,
): KeySlot[] {
  const patterns = options.abstractDateKeys
    ? keys.map((key) => recognizeDatePattern(key))
    : keys.map(() => undefined);
  const counts = countKeyPatterns(patterns);
  const slots = new Map<string, KeySlot>();

  keys.forEach((key, index) => {
    const pattern = patterns[index];
    const grouped =
      pattern !== undefined &&
      (counts.get(pattern) ?? 0) >= options.minKeyGroupSize;
    const name = grouped
      ? formatPlaceholderName(options.placeholderTemplate, pattern, depth)
      : key;

    let slot = slots.get(name);
    if (!slot) {
      slot = { name, keys: [], indices: [] };
      slots.set(name, slot);
    }
    // A literal key spelled like a placeholder shares the placeholder's slot
    if (grouped) {
      slot.pattern = pattern;
    }
    slot.keys.push(key);
    slot.indices.push(index);
  });

  return Array.from(slots.values());
}
