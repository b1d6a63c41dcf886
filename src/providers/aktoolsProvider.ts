import { z } from 'zod';
import {
  BalanceSheetRow,
  BuybackProgress,
  BuybackRecord,
  ControllerRecord,
  DividendRecord,
  FinancingEvent,
  IncomeStatementRow,
  MarketDataProvider,
  PledgeRecord,
  ProviderId,
  QuoteRecord,
  StockListing,
} from '../domain/contracts';
import { MalformedPayloadError } from '../domain/errors';
import { HttpClient, QueryParams } from './httpClient';

export interface AktoolsProviderConfig {
  client: HttpClient;
  baseUrl?: string;
}

export const DEFAULT_AKTOOLS_URL = 'http://127.0.0.1:8080/api/public';

const cell = z.union([z.string(), z.number(), z.null()]).optional();
const text = cell.transform((value) => (value === null || value === undefined ? '' : String(value).trim()));
const numeric = cell.transform(toNumber);

const listingSchema = z.object({ code: text, name: text });
const incomeSchema = z.object({ 报告日: cell, 营业总收入: numeric, 净利润: numeric });
const balanceSchema = z.object({
  报告日: cell,
  货币资金: numeric,
  短期借款: numeric,
  长期借款: numeric,
  应付债券: numeric,
});
// Cash dividends are quoted per ten shares.
const dividendSchema = z.object({ 报告期: cell, '现金分红-现金分红比例': numeric });
const infoSchema = z.object({ item: text, value: cell });
const controllerSchema = z.object({ 证券代码: text, 实际控制人名称: text, 控制类型: text });
const issuanceSchema = z.object({ 股票代码: text, 发行日期: cell });
const convertibleSchema = z.object({ 正股代码: text, 公告日期: cell });
const buybackSchema = z.object({ 股票代码: text, 实施进度: text });
const pledgeSchema = z.object({ 股票代码: text, 占所持股份比例: numeric });

const PRICE_ITEMS = new Set(['最新', '最新价', '股价']);

/**
 * Adapter for an AKTools gateway (`GET {baseUrl}/{function}`). Column names are
 * pinned per dataset; rows whose pinned columns hold unexpected types are
 * dropped.
 */
export class AktoolsProvider implements MarketDataProvider {
  readonly id: ProviderId = 'aktools';
  private readonly baseUrl: string;

  constructor(private readonly config: AktoolsProviderConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_AKTOOLS_URL).replace(/\/+$/, '');
  }

  async listStocks(): Promise<StockListing[]> {
    const rows = await this.readTable('stock_info_a_code_name', listingSchema);
    return rows
      .map((row) => ({ code: normalizeCode(row.code), name: row.name }))
      .filter((row) => row.code.length === 6);
  }

  async getIncomeStatements(code: string): Promise<IncomeStatementRow[]> {
    const rows = await this.readTable('stock_financial_report_sina', incomeSchema, {
      stock: exchangeSymbol(code),
      symbol: '利润表',
    });
    return rows
      .map((row) => ({
        reportDate: toIsoDate(row['报告日']),
        totalRevenue: row['营业总收入'] ?? 0,
        netProfit: row['净利润'] ?? 0,
      }))
      .filter((row) => row.reportDate !== '');
  }

  async getBalanceSheets(code: string): Promise<BalanceSheetRow[]> {
    const rows = await this.readTable('stock_financial_report_sina', balanceSchema, {
      stock: exchangeSymbol(code),
      symbol: '资产负债表',
    });
    return rows
      .map((row) => ({
        reportDate: toIsoDate(row['报告日']),
        cashEquivalents: row['货币资金'] ?? 0,
        shortTermBorrowings: row['短期借款'] ?? 0,
        longTermBorrowings: row['长期借款'] ?? 0,
        bondsPayable: row['应付债券'] ?? 0,
      }))
      .filter((row) => row.reportDate !== '');
  }

  async getDividendHistory(code: string): Promise<DividendRecord[]> {
    const rows = await this.readTable('stock_fhps_detail_em', dividendSchema, { symbol: code });
    return rows
      .map((row) => ({
        reportPeriod: toIsoDate(row['报告期']),
        cashPerShare: (row['现金分红-现金分红比例'] ?? 0) / 10,
      }))
      .filter((row) => row.reportPeriod !== '');
  }

  async getQuote(code: string): Promise<QuoteRecord[]> {
    const rows = await this.readTable('stock_individual_info_em', infoSchema, { symbol: code });
    const priceRow = rows.find((row) => PRICE_ITEMS.has(row.item));
    if (!priceRow) {
      return [];
    }
    return [{ code, price: toNumber(priceRow.value) }];
  }

  async getControllers(): Promise<ControllerRecord[]> {
    const rows = await this.readTable('stock_hold_control_cninfo', controllerSchema, { symbol: '全部' });
    return rows.map((row) => ({
      code: normalizeCode(row['证券代码']),
      controllerName: row['实际控制人名称'],
      controlType: row['控制类型'],
    }));
  }

  async getAdditionalIssuances(): Promise<FinancingEvent[]> {
    const rows = await this.readTable('stock_qbzf_em', issuanceSchema);
    return rows
      .map((row) => ({ code: normalizeCode(row['股票代码']), eventDate: toIsoDate(row['发行日期']) }))
      .filter((row) => row.eventDate !== '');
  }

  async getConvertibleBonds(): Promise<FinancingEvent[]> {
    const rows = await this.readTable('bond_cov_stock_issue_cninfo', convertibleSchema);
    return rows
      .map((row) => ({ code: normalizeCode(row['正股代码']), eventDate: toIsoDate(row['公告日期']) }))
      .filter((row) => row.eventDate !== '');
  }

  async getBuybacks(): Promise<BuybackRecord[]> {
    const rows = await this.readTable('stock_repurchase_em', buybackSchema);
    return rows.map((row) => ({
      code: normalizeCode(row['股票代码']),
      progress: classifyBuybackProgress(row['实施进度']),
    }));
  }

  async getPledges(): Promise<PledgeRecord[]> {
    const rows = await this.readTable('stock_gpzy_pledge_ratio_detail_em', pledgeSchema);
    return rows.map((row) => ({
      code: normalizeCode(row['股票代码']),
      pledgeRatio: row['占所持股份比例'] ?? 0,
    }));
  }

  private async readTable<S extends z.ZodTypeAny>(
    fn: string,
    schema: S,
    params?: QueryParams,
  ): Promise<z.output<S>[]> {
    const body = await this.config.client.getJson(`${this.baseUrl}/${fn}`, params);
    if (!Array.isArray(body)) {
      throw new MalformedPayloadError(fn, 'expected an array of rows');
    }

    const rows: z.output<S>[] = [];
    for (const raw of body) {
      const parsed = schema.safeParse(raw);
      if (parsed.success) {
        rows.push(parsed.data);
      }
    }
    return rows;
  }
}

export function normalizeCode(raw: string): string {
  const digits = raw.trim().toLowerCase().replace(/^(sh|sz|bj)\.?/, '');
  return /^\d{1,6}$/.test(digits) ? digits.padStart(6, '0') : digits;
}

export function exchangeSymbol(code: string): string {
  return code.startsWith('6') ? `sh${code}` : `sz${code}`;
}

export function toNumber(value: unknown): number | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number(String(value).replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Accepts `20231231` (as text or number), `2023-12-31`, ISO timestamps and epoch milliseconds. */
export function toIsoDate(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    if (Number.isInteger(value) && value >= 10_000_000 && value <= 99_999_999) {
      return toIsoDate(String(value));
    }
    return new Date(value).toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') {
    return '';
  }
  const trimmed = value.trim();
  const compact = trimmed.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (compact) {
    return `${compact[1]}-${compact[2]}-${compact[3]}`;
  }
  const dashed = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})/);
  return dashed ? `${dashed[1]}-${dashed[2]}-${dashed[3]}` : '';
}

export function classifyBuybackProgress(raw: string): BuybackProgress {
  if (/停止|终止|失效|取消/.test(raw)) {
    return 'terminated';
  }
  if (raw.includes('完成')) {
    return 'completed';
  }
  if (raw.includes('实施')) {
    return 'in-progress';
  }
  if (raw.includes('股东大会通过')) {
    return 'approved';
  }
  if (raw.includes('预案')) {
    return 'proposed';
  }
  return 'unknown';
}
