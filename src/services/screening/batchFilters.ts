import { CriterionId, ProgressListener } from '../../domain/contracts';
import { ScreeningDataSource } from '../fetching/screeningDataSource';
import { Logger } from '../../logging/logger';
import { activeBuybackCodes, hasDividendStreak, isStateOwned, recentFinancers } from './predicates';
import { poolSize, runPool } from './workerPool';

export interface BatchContext {
  source: ScreeningDataSource;
  asOf: Date;
  maxWorkers: number;
  progressEvery: number;
  report: ProgressListener;
  logger: Logger;
}

export interface BatchStepResult {
  passed: string[];
  /** False when the step's dataset was unavailable and the input passed through. */
  available: boolean;
}

export interface BatchStep {
  criterionId: CriterionId;
  label: string;
  apply(codes: string[], context: BatchContext): Promise<BatchStepResult>;
}

const passThrough = (codes: string[]): BatchStepResult => ({ passed: codes, available: false });

const keep = (codes: string[], predicate: (code: string) => boolean): BatchStepResult => ({
  passed: codes.filter(predicate),
  available: true,
});

export const stateOwnershipStep: BatchStep = {
  criterionId: 5,
  label: 'State-owned controlling shareholder',
  async apply(codes, { source, logger }) {
    const controllers = await source.getControllers();
    if (controllers.length === 0) {
      logger.warn('controller dataset unavailable, skipping state ownership filter');
      return passThrough(codes);
    }
    const stateOwned = new Set(controllers.filter(isStateOwned).map((record) => record.code));
    return keep(codes, (code) => stateOwned.has(code));
  },
};

/**
 * Dividend history has no bulk endpoint, so per-code tables are fetched through
 * the worker pool. When every table comes back empty the dataset is treated as
 * unavailable rather than as five years of missed dividends for everyone.
 */
export const dividendStreakStep: BatchStep = {
  criterionId: 3,
  label: 'Five consecutive years of cash dividends',
  async apply(codes, { source, asOf, maxWorkers, progressEvery, report, logger }) {
    const qualifying = new Set<string>();
    let anyData = false;

    await runPool(
      codes,
      poolSize(maxWorkers, codes.length),
      (code) => source.getDividendHistory(code),
      (completion, settled) => {
        if (settled % progressEvery === 0 || settled === codes.length) {
          report({
            message: `Dividend history: checked ${settled}/${codes.length}`,
            stage: dividendStreakStep.label,
            remaining: codes.length - settled,
          });
        }
        if (!completion.ok) {
          logger.warn({ code: completion.item, err: completion.error }, 'dividend history lookup failed');
          return;
        }
        if (completion.value.length > 0) {
          anyData = true;
        }
        if (hasDividendStreak(completion.value, asOf)) {
          qualifying.add(completion.item);
        }
      },
    );

    if (!anyData) {
      logger.warn('no dividend history available for any code, skipping dividend streak filter');
      return passThrough(codes);
    }
    return keep(codes, (code) => qualifying.has(code));
  },
};

export const noRecentFinancingStep: BatchStep = {
  criterionId: 3,
  label: 'No equity issuance or convertible bonds in five years',
  async apply(codes, { source, asOf, logger }) {
    const issuances = await source.getAdditionalIssuances();
    const bonds = await source.getConvertibleBonds();
    if (issuances.length === 0 && bonds.length === 0) {
      logger.warn('issuance and convertible bond datasets unavailable, skipping financing filter');
      return passThrough(codes);
    }
    if (issuances.length === 0 || bonds.length === 0) {
      logger.warn(
        { issuances: issuances.length, bonds: bonds.length },
        'one financing dataset unavailable, filtering on the other',
      );
    }
    const financed = new Set([...recentFinancers(issuances, asOf), ...recentFinancers(bonds, asOf)]);
    return keep(codes, (code) => !financed.has(code));
  },
};

export const buybackStep: BatchStep = {
  criterionId: 6,
  label: 'Active share buyback',
  async apply(codes, { source, logger }) {
    const buybacks = await source.getBuybacks();
    if (buybacks.length === 0) {
      logger.warn('buyback dataset unavailable, skipping buyback filter');
      return passThrough(codes);
    }
    const active = activeBuybackCodes(buybacks);
    return keep(codes, (code) => active.has(code));
  },
};

export const BATCH_STEPS: readonly BatchStep[] = [
  stateOwnershipStep,
  dividendStreakStep,
  noRecentFinancingStep,
  buybackStep,
];
