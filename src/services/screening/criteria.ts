import { CriterionId, CriterionInfo } from '../../domain/contracts';

export const CRITERIA: readonly CriterionInfo[] = [
  { id: 1, label: 'Three-year annual revenue and profit growth', phase: 'individual' },
  { id: 2, label: 'Quarterly YoY and QoQ growth', phase: 'individual' },
  { id: 3, label: 'Five years of cash dividends, no new equity or bonds', phase: 'batch' },
  { id: 4, label: 'Dividend yield of at least 4%', phase: 'individual' },
  { id: 5, label: 'State-owned controlling shareholder', phase: 'batch' },
  { id: 6, label: 'Active share buyback', phase: 'batch' },
  { id: 7, label: 'Stable actual controller', phase: 'individual' },
  { id: 8, label: 'Cash exceeds interest-bearing debt', phase: 'individual' },
];

export const ALL_CRITERIA: readonly CriterionId[] = CRITERIA.map((criterion) => criterion.id);

export function isCriterionId(value: unknown): value is CriterionId {
  return typeof value === 'number' && ALL_CRITERIA.some((id) => id === value);
}

/**
 * Normalises a caller selection: `undefined` selects all criteria, an empty
 * list selects none; unknown ids are rejected.
 */
export function resolveCriteria(selection?: Iterable<number>): CriterionId[] {
  if (!selection) {
    return [...ALL_CRITERIA];
  }

  const chosen = new Set<CriterionId>();
  for (const value of selection) {
    if (!isCriterionId(value)) {
      throw new RangeError(`Unknown criterion id: ${value}`);
    }
    chosen.add(value);
  }

  return [...chosen].sort((a, b) => a - b);
}
