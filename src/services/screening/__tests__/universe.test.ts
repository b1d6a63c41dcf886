import { describe, it, expect } from 'vitest';
import { buildUniverse, classifyBoard, isFlaggedName } from '../universe';
import { resolveCriteria } from '../criteria';
import { fail, indeterminate, pass, retains } from '../filterOutcome';

describe('buildUniverse', () => {
  const listings = [
    { code: '600000', name: '浦发银行' },
    { code: '000001', name: '平安银行' },
    { code: '300750', name: '宁德时代' },
    { code: '688981', name: '中芯国际' },
    { code: '830799', name: '艾融软件' },
    { code: '600001', name: '*ST某某' },
    { code: '000002', name: '某某退' },
    { code: '900901', name: '某某B股' },
    { code: '600000', name: '浦发银行' },
  ];

  it('keeps Shanghai and Shenzhen main board, ChiNext and STAR codes without flagged names', () => {
    const universe = buildUniverse(listings);
    expect(universe.stocks).toEqual([
      { code: '600000', name: '浦发银行', board: 'main' },
      { code: '000001', name: '平安银行', board: 'main' },
      { code: '300750', name: '宁德时代', board: 'chinext' },
      { code: '688981', name: '中芯国际', board: 'star' },
    ]);
  });

  it('names every listing, screened or not', () => {
    const { names } = buildUniverse(listings);
    expect(names['830799']).toBe('艾融软件');
    expect(names['600001']).toBe('*ST某某');
    expect(Object.keys(names)).toHaveLength(8);
  });

  it('pads short codes', () => {
    expect(buildUniverse([{ code: '2594', name: '比亚迪' }]).stocks).toEqual([
      { code: '002594', name: '比亚迪', board: 'main' },
    ]);
  });
});

describe('classifyBoard', () => {
  it('maps code prefixes to boards', () => {
    expect(classifyBoard('601398')).toBe('main');
    expect(classifyBoard('002594')).toBe('main');
    expect(classifyBoard('300750')).toBe('chinext');
    expect(classifyBoard('688981')).toBe('star');
    expect(classifyBoard('430047')).toBe('beijing');
    expect(classifyBoard('920001')).toBe('beijing');
    expect(classifyBoard('900901')).toBeNull();
  });
});

describe('isFlaggedName', () => {
  it('flags special treatment and delisting names', () => {
    expect(isFlaggedName('ST某某')).toBe(true);
    expect(isFlaggedName('*ST某某')).toBe(true);
    expect(isFlaggedName('某某退')).toBe(true);
    expect(isFlaggedName('贵州茅台')).toBe(false);
  });
});

describe('resolveCriteria', () => {
  it('selects every criterion when no selection is given', () => {
    expect(resolveCriteria()).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('selects nothing for an empty selection', () => {
    expect(resolveCriteria([])).toEqual([]);
  });

  it('deduplicates and sorts a selection', () => {
    expect(resolveCriteria([6, 5, 5])).toEqual([5, 6]);
  });

  it('rejects unknown ids', () => {
    expect(() => resolveCriteria([9])).toThrow(RangeError);
    expect(() => resolveCriteria([2, 0])).toThrow('Unknown criterion id: 0');
  });
});

describe('retains', () => {
  it('keeps passes and unknowns, drops failures', () => {
    expect(retains(pass())).toBe(true);
    expect(retains(indeterminate('no data'))).toBe(true);
    expect(retains(fail('too small'))).toBe(false);
  });
});
