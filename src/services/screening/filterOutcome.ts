import { FilterOutcome } from '../../domain/contracts';

export const pass = (): FilterOutcome => ({ kind: 'pass' });
export const fail = (reason: string): FilterOutcome => ({ kind: 'fail', reason });
export const indeterminate = (reason: string): FilterOutcome => ({ kind: 'indeterminate', reason });

/**
 * The single place an outcome turns into keep/drop. Indeterminate results keep
 * the entity: missing upstream data is never read as a disqualification.
 */
export function retains(outcome: FilterOutcome): boolean {
  switch (outcome.kind) {
    case 'pass':
    case 'indeterminate':
      return true;
    case 'fail':
      return false;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled outcome ${JSON.stringify(unreachable)}`);
    }
  }
}
