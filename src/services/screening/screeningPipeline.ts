import {
  CriterionId,
  DataDates,
  ProgressListener,
  ScreeningProgress,
  ScreeningReport,
  StageResult,
} from '../../domain/contracts';
import { describeError } from '../../domain/errors';
import { componentLogger, Logger } from '../../logging/logger';
import { ScreeningDataSource } from '../fetching/screeningDataSource';
import { BATCH_STEPS, BatchStep } from './batchFilters';
import { resolveCriteria } from './criteria';
import { retains } from './filterOutcome';
import { EntityEvaluator, INDIVIDUAL_CRITERIA, IndividualCriterion } from './individualFilters';
import { buildUniverse } from './universe';
import { MAX_POOL_SIZE, poolSize, runPool } from './workerPool';

export interface ScreeningPipelineConfig {
  source: ScreeningDataSource;
  maxWorkers?: number;
  progressEvery?: number;
  now?: () => Date;
  logger?: Logger;
  batchSteps?: readonly BatchStep[];
  individualCriteria?: readonly IndividualCriterion[];
}

export const DEFAULT_PROGRESS_EVERY = 20;

/**
 * Two-phase screen. Phase 1 applies set-based steps in a fixed order; phase 2
 * fans each remaining criterion out over the surviving codes. Both phases stop
 * as soon as nothing survives.
 */
export class ScreeningPipeline {
  private readonly logger: Logger;
  private readonly maxWorkers: number;
  private readonly progressEvery: number;
  private readonly now: () => Date;
  private readonly batchSteps: readonly BatchStep[];
  private readonly individualCriteria: readonly IndividualCriterion[];

  constructor(private readonly config: ScreeningPipelineConfig) {
    this.logger = componentLogger(config.logger, 'pipeline');
    this.maxWorkers = Math.max(1, config.maxWorkers ?? MAX_POOL_SIZE);
    this.progressEvery = Math.max(1, config.progressEvery ?? DEFAULT_PROGRESS_EVERY);
    this.now = config.now ?? (() => new Date());
    this.batchSteps = config.batchSteps ?? BATCH_STEPS;
    this.individualCriteria = config.individualCriteria ?? INDIVIDUAL_CRITERIA;
  }

  async run(selection?: Iterable<number>, onProgress?: ProgressListener): Promise<ScreeningReport> {
    const selected = resolveCriteria(selection);
    const active = new Set<CriterionId>(selected);
    const asOf = this.now();
    const report = (progress: ScreeningProgress): void => {
      this.logger.debug({ ...progress }, progress.message);
      onProgress?.(progress);
    };

    const { source } = this.config;
    const listings = await source.getStockList();
    const universe = buildUniverse(listings);
    let passed = universe.stocks.map((stock) => stock.code);
    const totalInitial = passed.length;
    const stages: StageResult[] = [];

    this.logger.info({ criteria: selected, universe: totalInitial }, 'screening started');
    report({ message: `Loaded ${totalInitial} stocks (ST and delisting excluded)`, stage: 'init', remaining: totalInitial });

    const dataDates = await this.collectDataDates(passed, asOf);

    const batchSteps = this.batchSteps.filter((step) => active.has(step.criterionId));
    for (const step of batchSteps) {
      const before = passed.length;
      report({ message: `Checking: ${step.label}`, stage: step.label, remaining: before });
      try {
        const result = await step.apply(passed, {
          source,
          asOf,
          maxWorkers: this.maxWorkers,
          progressEvery: this.progressEvery,
          report,
          logger: this.logger.child({ step: step.label }),
        });
        passed = result.passed;
        if (!result.available) {
          this.logger.info({ step: step.label }, 'step skipped, dataset unavailable');
        }
      } catch (error) {
        this.logger.error({ step: step.label, err: describeError(error) }, 'batch step failed, keeping input');
      }
      stages.push(this.stage(step.criterionId, step.label, before, passed.length));
      report({ message: `${step.label}: ${before} → ${passed.length}`, stage: step.label, remaining: passed.length });
      if (passed.length === 0) {
        break;
      }
    }

    const individual = this.individualCriteria.filter((criterion) => active.has(criterion.criterionId));
    for (const criterion of individual) {
      if (passed.length === 0) {
        break;
      }
      const before = passed.length;
      report({ message: `Checking each stock: ${criterion.label}`, stage: criterion.label, remaining: before });
      passed = await this.runIndividual(criterion, passed, asOf, report);
      stages.push(this.stage(criterion.criterionId, criterion.label, before, passed.length));
      report({ message: `${criterion.label}: ${before} → ${passed.length}`, stage: criterion.label, remaining: passed.length });
    }

    const finalCount = passed.length;
    this.logger.info({ criteria: selected, finalCount }, 'screening finished');
    report({ message: `Screening complete (${selected.length} criteria): ${finalCount} stocks passed`, stage: 'done', remaining: finalCount });

    return {
      totalInitial,
      stages,
      passed,
      stockNames: universe.names,
      finalCount,
      selectedCriteria: selected,
      dataDates,
    };
  }

  /**
   * Evaluates one criterion for every code. Outcomes reach a single collector;
   * indeterminate results and thrown errors keep the code. Returns once every
   * worker has settled, preserving the input order.
   */
  private async runIndividual(
    criterion: IndividualCriterion,
    codes: string[],
    asOf: Date,
    report: ProgressListener,
  ): Promise<string[]> {
    let evaluate: EntityEvaluator;
    try {
      evaluate = await criterion.prepare({ source: this.config.source, asOf });
    } catch (error) {
      this.logger.error({ criterion: criterion.label, err: describeError(error) }, 'criterion setup failed, keeping input');
      return codes;
    }

    const dropped = new Set<string>();
    let skipped = 0;

    await runPool(codes, poolSize(this.maxWorkers, codes.length), evaluate, (completion, settled) => {
      if (settled % this.progressEvery === 0 || settled === codes.length) {
        report({
          message: `${criterion.label}: checked ${settled}/${codes.length}`,
          stage: criterion.label,
          remaining: codes.length - settled,
        });
      }

      if (!completion.ok) {
        skipped++;
        this.logger.warn(
          { criterion: criterion.label, code: completion.item, err: describeError(completion.error) },
          'check failed, keeping stock',
        );
        return;
      }
      if (completion.value.kind === 'indeterminate') {
        skipped++;
      }
      if (!retains(completion.value)) {
        dropped.add(completion.item);
      }
    });

    if (skipped > 0) {
      this.logger.info({ criterion: criterion.label, skipped }, 'stocks kept for lack of data');
    }
    return codes.filter((code) => !dropped.has(code));
  }

  private stage(criterionId: CriterionId, label: string, before: number, after: number): StageResult {
    return { criterion: label, criterionId, before, after, eliminated: before - after };
  }

  private async collectDataDates(codes: string[], asOf: Date): Promise<DataDates> {
    const dataDates: DataDates = { screeningTime: asOf.toISOString() };
    const { source } = this.config;

    try {
      const stockListUpdate = await source.stockListUpdatedAt();
      if (stockListUpdate) {
        dataDates.stockListUpdate = stockListUpdate.toISOString();
      }

      const sample = codes[0];
      if (sample) {
        const statements = await source.getIncomeStatements(sample);
        const latest = statements.map((row) => row.reportDate).sort().at(-1);
        if (latest) {
          dataDates.latestFinancialReport = latest;
        }
        const priceUpdate = await source.quoteUpdatedAt(sample);
        if (priceUpdate) {
          dataDates.priceDataUpdate = priceUpdate.toISOString();
        }
      }
    } catch (error) {
      this.logger.debug({ err: describeError(error) }, 'could not collect data dates');
    }

    return dataDates;
  }
}
