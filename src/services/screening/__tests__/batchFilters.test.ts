import { describe, it, expect, vi } from 'vitest';
import {
  createTestDataSource,
  FakeMarketData,
  FakeMarketDataProvider,
  silentLogger,
} from '../../../__tests__/support/fakes';
import { ProgressListener } from '../../../domain/contracts';
import {
  BatchContext,
  buybackStep,
  dividendStreakStep,
  noRecentFinancingStep,
  stateOwnershipStep,
} from '../batchFilters';

const asOf = new Date('2024-06-30T00:00:00Z');
const codes = ['600001', '600002', '600003'];

function context(data: FakeMarketData, report: ProgressListener = () => undefined): BatchContext {
  return {
    source: createTestDataSource(new FakeMarketDataProvider(data)),
    asOf,
    maxWorkers: 4,
    progressEvery: 20,
    report,
    logger: silentLogger(),
  };
}

const streak = (years: number[]) => years.map((year) => ({ reportPeriod: `${year}-12-31`, cashPerShare: 0.2 }));

describe('stateOwnershipStep', () => {
  it('keeps state-controlled codes', async () => {
    const result = await stateOwnershipStep.apply(
      codes,
      context({
        controllers: [
          { code: '600001', controllerName: '某省国资委', controlType: '' },
          { code: '600002', controllerName: '张三', controlType: '境内自然人' },
        ],
      }),
    );
    expect(result).toEqual({ passed: ['600001'], available: true });
  });

  it('passes everything through when the controller dataset is empty', async () => {
    const result = await stateOwnershipStep.apply(codes, context({}));
    expect(result).toEqual({ passed: codes, available: false });
  });
});

describe('dividendStreakStep', () => {
  it('keeps codes with five straight years of cash dividends', async () => {
    const report = vi.fn();
    const result = await dividendStreakStep.apply(
      codes,
      context(
        {
          dividends: {
            '600001': streak([2019, 2020, 2021, 2022, 2023]),
            '600002': streak([2020, 2021, 2022, 2023]),
          },
        },
        report,
      ),
    );

    expect(result).toEqual({ passed: ['600001'], available: true });
    expect(report).toHaveBeenCalledTimes(1);
    expect(report).toHaveBeenCalledWith({
      message: 'Dividend history: checked 3/3',
      stage: 'Five consecutive years of cash dividends',
      remaining: 0,
    });
  });

  it('passes everything through when no code has any dividend history', async () => {
    const result = await dividendStreakStep.apply(codes, context({}));
    expect(result).toEqual({ passed: codes, available: false });
  });
});

describe('noRecentFinancingStep', () => {
  it('drops codes that issued equity or convertible bonds in the last five years', async () => {
    const result = await noRecentFinancingStep.apply(
      codes,
      context({
        issuances: [
          { code: '600002', eventDate: '2022-01-01' },
          { code: '600003', eventDate: '2015-01-01' },
        ],
        bonds: [{ code: '600003', eventDate: '2023-05-10' }],
      }),
    );
    expect(result).toEqual({ passed: ['600001'], available: true });
  });

  it('filters on one dataset when the other is unavailable', async () => {
    const result = await noRecentFinancingStep.apply(
      codes,
      context({ issuances: [{ code: '600002', eventDate: '2022-01-01' }] }),
    );
    expect(result).toEqual({ passed: ['600001', '600003'], available: true });
  });

  it('passes everything through when both datasets are empty', async () => {
    const result = await noRecentFinancingStep.apply(codes, context({}));
    expect(result).toEqual({ passed: codes, available: false });
  });
});

describe('buybackStep', () => {
  it('keeps codes with a live buyback programme', async () => {
    const result = await buybackStep.apply(
      codes,
      context({
        buybacks: [
          { code: '600001', progress: 'in-progress' },
          { code: '600002', progress: 'terminated' },
        ],
      }),
    );
    expect(result).toEqual({ passed: ['600001'], available: true });
  });

  it('passes everything through when the buyback dataset is empty', async () => {
    expect(await buybackStep.apply(codes, context({}))).toEqual({ passed: codes, available: false });
  });
});
