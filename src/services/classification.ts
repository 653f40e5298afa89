import type { MetricSlot } from '../types.js';
import { normalizeTitle } from '../utils/normalize.js';

export interface SlotRule {
  slot: MetricSlot;
  matches: (title: string) => boolean;
}

const has = (title: string, ...terms: string[]) => terms.every((term) => title.includes(term));

/**
 * Slot rules in priority order. Titles are lower-cased before matching.
 * Any title containing "total" lands in tsys_tps, whatever else it names.
 */
export const SLOT_RULES: readonly SlotRule[] = [
  { slot: 'tsys_tps', matches: (t) => has(t, 'total') || has(t, 'tsys', 'tps') },
  { slot: 'hpns_tps', matches: (t) => has(t, 'hpns', 'tps') },
  { slot: 'tsys_capacity', matches: (t) => has(t, 'tsys', 'capacity') },
  { slot: 'hpns_capacity', matches: (t) => has(t, 'hpns', 'capacity') },
  { slot: 'tps_ratio', matches: (t) => has(t, 'ratio') },
];

/**
 * Map a widget title to its metric slot using the first matching rule.
 * Returns undefined when no rule matches.
 */
export function classifyTitle(title: string, rules: readonly SlotRule[] = SLOT_RULES): MetricSlot | undefined {
  const normalized = normalizeTitle(title);
  return rules.find((rule) => rule.matches(normalized))?.slot;
}
