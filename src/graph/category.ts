import type { ModuleCategory } from './types.js';

export const CATEGORY_ORDER: readonly ModuleCategory[] = [
  'entry-point',
  'standard',
  'important',
  'critical',
];

/**
 * Buckets a module by how many modules import it: more than 5 is critical,
 * 3–5 important, 1–2 standard, and 0 marks a probable entry point.
 */
export function categorize(inDegree: number): ModuleCategory {
  if (inDegree > 5) return 'critical';
  if (inDegree > 2) return 'important';
  if (inDegree > 0) return 'standard';
  return 'entry-point';
}
