/**
 * checkdesk CLI — Option parsing shared by the headless commands.
 */

import { ENABLE_ORDER, type SeverityFilters } from '../types/index.js';

/**
 * Parse `--enable warning,style` into filter overrides. Every level that can
 * be forwarded is set explicitly, so the list replaces the configured ones.
 * `none` clears them all.
 */
export function parseEnableOption(value: string): Partial<SeverityFilters> {
  const names = value.split(',').map(s => s.trim().toLowerCase()).filter(Boolean);
  const wanted = names.length === 1 && names[0] === 'none' ? [] : names;

  const result: Partial<SeverityFilters> = {};
  for (const s of ENABLE_ORDER) result[s] = false;
  for (const name of wanted) {
    const match = ENABLE_ORDER.find(s => s === name);
    if (!match) {
      throw new Error(`Unknown severity "${name}" (expected ${ENABLE_ORDER.join(', ')} or none)`);
    }
    result[match] = true;
  }
  return result;
}
