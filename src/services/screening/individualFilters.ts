import { ControllerRecord, CriterionId, FilterOutcome } from '../../domain/contracts';
import { ScreeningDataSource } from '../fetching/screeningDataSource';
import { indeterminate } from './filterOutcome';
import {
  evaluateAnnualGrowth,
  evaluateCashCoverage,
  evaluateControllerStability,
  evaluateDividendYield,
  evaluateQuarterlyGrowth,
} from './predicates';

export type EntityEvaluator = (code: string) => Promise<FilterOutcome>;

export interface IndividualContext {
  source: ScreeningDataSource;
  asOf: Date;
}

/**
 * A per-entity criterion. `prepare` runs once before fan-out and fetches any
 * bulk dataset the evaluator needs, so workers only touch per-entity endpoints.
 */
export interface IndividualCriterion {
  criterionId: CriterionId;
  label: string;
  prepare(context: IndividualContext): Promise<EntityEvaluator>;
}

export const dividendYieldCriterion: IndividualCriterion = {
  criterionId: 4,
  label: 'Dividend yield of at least 4%',
  async prepare({ source, asOf }) {
    return async (code) => {
      const [quote] = await source.getQuote(code);
      if (!quote || quote.price === undefined) {
        return indeterminate('no quote');
      }
      const dividends = await source.getDividendHistory(code);
      return evaluateDividendYield(quote.price, dividends, asOf);
    };
  },
};

export const annualGrowthCriterion: IndividualCriterion = {
  criterionId: 1,
  label: 'Three-year annual revenue and profit growth',
  async prepare({ source }) {
    return async (code) => {
      const statements = await source.getIncomeStatements(code);
      if (statements.length === 0) {
        return indeterminate('no income statements');
      }
      return evaluateAnnualGrowth(statements);
    };
  },
};

export const quarterlyGrowthCriterion: IndividualCriterion = {
  criterionId: 2,
  label: 'Quarterly YoY and QoQ growth',
  async prepare({ source }) {
    return async (code) => evaluateQuarterlyGrowth(await source.getIncomeStatements(code));
  },
};

export const controllerStabilityCriterion: IndividualCriterion = {
  criterionId: 7,
  label: 'Stable actual controller',
  async prepare({ source }) {
    const controllers = await source.getControllers();
    const byCode = new Map<string, ControllerRecord[]>();
    for (const record of controllers) {
      const rows = byCode.get(record.code);
      if (rows) {
        rows.push(record);
      } else {
        byCode.set(record.code, [record]);
      }
    }
    const available = controllers.length > 0;
    return async (code) => evaluateControllerStability(byCode.get(code), available);
  },
};

export const cashCoverageCriterion: IndividualCriterion = {
  criterionId: 8,
  label: 'Cash exceeds interest-bearing debt',
  async prepare({ source }) {
    const pledgeRatios = new Map<string, number>();
    for (const pledge of await source.getPledges()) {
      // First row per code wins.
      if (!pledgeRatios.has(pledge.code)) {
        pledgeRatios.set(pledge.code, pledge.pledgeRatio);
      }
    }
    return async (code) => evaluateCashCoverage(await source.getBalanceSheets(code), pledgeRatios.get(code));
  },
};

export const INDIVIDUAL_CRITERIA: readonly IndividualCriterion[] = [
  dividendYieldCriterion,
  annualGrowthCriterion,
  quarterlyGrowthCriterion,
  controllerStabilityCriterion,
  cashCoverageCriterion,
];
