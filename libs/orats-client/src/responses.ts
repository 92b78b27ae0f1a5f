import { z } from 'zod';
import { normalizeDate } from './requests';

/**
 * Response records of the Data API, keyed by the API's own field names.
 *
 * Every schema strips unknown keys, so a record only carries what is declared
 * here. Dates stay `YYYY-MM-DD` strings and timestamps stay ISO strings.
 */

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/** Placeholder the API sends for an unknown earnings date. */
export const NULL_DATE = '0000-00-00';

const isoDate = z.string().regex(ISO_DATE, 'expected a YYYY-MM-DD date').describe('date');

const timestamp = z.string().min(1, 'expected a timestamp').describe('timestamp');

// Core earnings history dates arrive as MM/DD/YYYY.
const usDate = z
  .string()
  .transform((value, ctx) => {
    const match = US_DATE.exec(value);
    const normalized = normalizeDate(match ? `${match[3]}-${match[1]}-${match[2]}` : value);
    if (!normalized) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a MM/DD/YYYY date' });
      return z.NEVER;
    }
    return normalized;
  })
  .describe('us-date');

const optionalDate = z
  .string()
  .transform((value, ctx) => {
    if (value === NULL_DATE) {
      return null;
    }
    if (!ISO_DATE.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a YYYY-MM-DD date' });
      return z.NEVER;
    }
    return value;
  })
  .describe('date');

// ============================================================================
// Underlying assets
// ============================================================================

export const tickerSchema = z.object({
  ticker: z.string(),
  min: isoDate,
  max: isoDate,
});

export const dailyPriceSchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  open: z.number(),
  hiPx: z.number(),
  loPx: z.number(),
  clsPx: z.number(),
  stockVolume: z.number(),
  unadjOpen: z.number(),
  unadjHiPx: z.number(),
  unadjLoPx: z.number(),
  unadjClsPx: z.number(),
  unadjStockVolume: z.number(),
  updatedAt: timestamp,
});

export const dividendHistorySchema = z.object({
  ticker: z.string(),
  exDate: isoDate,
  divAmt: z.number(),
  divFreq: z.number(),
  declaredDate: isoDate,
});

export const earningsHistorySchema = z.object({
  ticker: z.string(),
  earnDate: isoDate,
  anncTod: z.number(),
  updatedAt: timestamp,
});

export const stockSplitHistorySchema = z.object({
  ticker: z.string(),
  splitDate: isoDate,
  divisor: z.number(),
});

// ============================================================================
// Options
// ============================================================================

export const strikeSchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  expirDate: isoDate,
  dte: z.number(),
  strike: z.number(),
  spotPrice: z.number(),
  stockPrice: z.number(),
  smvVol: z.number(),
  extSmvVol: z.number(),
  callVolume: z.number(),
  callOpenInterest: z.number(),
  callBidSize: z.number(),
  callAskSize: z.number(),
  callBidPrice: z.number(),
  callAskPrice: z.number(),
  callValue: z.number(),
  callBidIv: z.number(),
  callMidIv: z.number(),
  callAskIv: z.number(),
  extCallValue: z.number(),
  putVolume: z.number(),
  putOpenInterest: z.number(),
  putBidSize: z.number(),
  putAskSize: z.number(),
  putBidPrice: z.number(),
  putAskPrice: z.number(),
  putValue: z.number(),
  extPutValue: z.number(),
  putBidIv: z.number(),
  putMidIv: z.number(),
  putAskIv: z.number(),
  residualRate: z.number(),
  delta: z.number(),
  gamma: z.number(),
  theta: z.number(),
  vega: z.number(),
  rho: z.number(),
  phi: z.number(),
  driftlessTheta: z.number(),
  updatedAt: timestamp,
});

/** Fields shared by implied and forecast monies (the volatility surface by delta). */
export const moneyForecastSchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  expirDate: isoDate,
  stockPrice: z.number(),
  riskFreeRate: z.number(),
  vol100: z.number(),
  vol95: z.number(),
  vol90: z.number(),
  vol85: z.number(),
  vol80: z.number(),
  vol75: z.number(),
  vol70: z.number(),
  vol65: z.number(),
  vol60: z.number(),
  vol55: z.number(),
  vol50: z.number(),
  vol45: z.number(),
  vol40: z.number(),
  vol35: z.number(),
  vol30: z.number(),
  vol25: z.number(),
  vol20: z.number(),
  vol15: z.number(),
  vol10: z.number(),
  vol5: z.number(),
  vol0: z.number(),
  updatedAt: timestamp,
});

export const moneyImpliedSchema = moneyForecastSchema.extend({
  spotPrice: z.number(),
  yieldRate: z.number(),
  residualYieldRate: z.number(),
  residualRateSlp: z.number(),
  residualR2: z.number(),
  confidence: z.number(),
  mwVol: z.number(),
  atmiv: z.number(),
  slope: z.number(),
  deriv: z.number(),
  fit: z.number(),
  calVol: z.number(),
  unadjVol: z.number(),
  earnEffect: z.number(),
});

// ============================================================================
// Volatility
// ============================================================================

export const summarySchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  stockPrice: z.number(),
  annActDiv: z.number(),
  annIdiv: z.number(),
  nextDiv: z.number(),
  impliedNextDiv: z.number(),
  borrow30: z.number(),
  borrow2y: z.number(),
  confidence: z.number(),
  exErnIv10d: z.number(),
  exErnIv20d: z.number(),
  exErnIv30d: z.number(),
  exErnIv60d: z.number(),
  exErnIv90d: z.number(),
  exErnIv6m: z.number(),
  exErnIv1y: z.number(),
  ieeEarnEffect: z.number(),
  impliedMove: z.number(),
  impliedEarningsMove: z.number(),
  iv10d: z.number(),
  iv20d: z.number(),
  iv30d: z.number(),
  iv60d: z.number(),
  iv90d: z.number(),
  iv6m: z.number(),
  iv1y: z.number(),
  mwAdj30: z.number(),
  mwAdj2y: z.number(),
  rDrv30: z.number(),
  rDrv2y: z.number(),
  rSlp30: z.number(),
  rSlp2y: z.number(),
  rVol30: z.number(),
  rVol2y: z.number(),
  rip: z.number(),
  riskFree30: z.number(),
  riskFree2y: z.number(),
  skewing: z.number(),
  contango: z.number(),
  totalErrorConf: z.number(),
  dlt5Iv10d: z.number(),
  dlt5Iv20d: z.number(),
  dlt5Iv30d: z.number(),
  dlt5Iv60d: z.number(),
  dlt5Iv90d: z.number(),
  dlt5Iv6m: z.number(),
  dlt5Iv1y: z.number(),
  exErnDlt5Iv10d: z.number(),
  exErnDlt5Iv20d: z.number(),
  exErnDlt5Iv30d: z.number(),
  exErnDlt5Iv60d: z.number(),
  exErnDlt5Iv90d: z.number(),
  exErnDlt5Iv6m: z.number(),
  exErnDlt5Iv1y: z.number(),
  dlt25Iv10d: z.number(),
  dlt25Iv20d: z.number(),
  dlt25Iv30d: z.number(),
  dlt25Iv60d: z.number(),
  dlt25Iv90d: z.number(),
  dlt25Iv6m: z.number(),
  dlt25Iv1y: z.number(),
  exErnDlt25Iv10d: z.number(),
  exErnDlt25Iv20d: z.number(),
  exErnDlt25Iv30d: z.number(),
  exErnDlt25Iv60d: z.number(),
  exErnDlt25Iv90d: z.number(),
  exErnDlt25Iv6m: z.number(),
  exErnDlt25Iv1y: z.number(),
  dlt75Iv10d: z.number(),
  dlt75Iv20d: z.number(),
  dlt75Iv30d: z.number(),
  dlt75Iv60d: z.number(),
  dlt75Iv90d: z.number(),
  dlt75Iv6m: z.number(),
  dlt75Iv1y: z.number(),
  exErnDlt75Iv10d: z.number(),
  exErnDlt75Iv20d: z.number(),
  exErnDlt75Iv30d: z.number(),
  exErnDlt75Iv60d: z.number(),
  exErnDlt75Iv90d: z.number(),
  exErnDlt75Iv6m: z.number(),
  exErnDlt75Iv1y: z.number(),
  dlt95Iv10d: z.number(),
  dlt95Iv20d: z.number(),
  dlt95Iv30d: z.number(),
  dlt95Iv60d: z.number(),
  dlt95Iv90d: z.number(),
  dlt95Iv6m: z.number(),
  dlt95Iv1y: z.number(),
  exErnDlt95Iv10d: z.number(),
  exErnDlt95Iv20d: z.number(),
  exErnDlt95Iv30d: z.number(),
  exErnDlt95Iv60d: z.number(),
  exErnDlt95Iv90d: z.number(),
  exErnDlt95Iv6m: z.number(),
  exErnDlt95Iv1y: z.number(),
  fwd30_20: z.number(),
  fwd60_30: z.number(),
  fwd90_60: z.number(),
  fwd180_90: z.number(),
  fwd90_30: z.number(),
  fexErn30_20: z.number(),
  fexErn60_30: z.number(),
  fexErn90_60: z.number(),
  fexErn180_90: z.number(),
  fexErn90_30: z.number(),
  ffwd30_20: z.number(),
  ffwd60_30: z.number(),
  ffwd90_60: z.number(),
  ffwd180_90: z.number(),
  ffwd90_30: z.number(),
  ffexErn30_20: z.number(),
  ffexErn60_30: z.number(),
  ffexErn90_60: z.number(),
  ffexErn180_90: z.number(),
  ffexErn90_30: z.number(),
  fbfwd30_20: z.number(),
  fbfwd60_30: z.number(),
  fbfwd90_60: z.number(),
  fbfwd180_90: z.number(),
  fbfwd90_30: z.number(),
  fbfexErn30_20: z.number(),
  fbfexErn60_30: z.number(),
  fbfexErn90_60: z.number(),
  fbfexErn180_90: z.number(),
  fbfexErn90_30: z.number(),
  updatedAt: timestamp,
});

export const coreSchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  assetType: z.number(),
  priorCls: z.number(),
  pxAtmIv: z.number(),
  mktCap: z.number(),
  cVolu: z.number(),
  cOi: z.number(),
  pVolu: z.number(),
  pOi: z.number(),
  orFcst20d: z.number(),
  orIvFcst20d: z.number(),
  orFcstInf: z.number(),
  orIvXern20d: z.number(),
  orIvXernInf: z.number(),
  iv200Ma: z.number(),
  atmIvM1: z.number(),
  atmFitIvM1: z.number(),
  atmFcstIvM1: z.number(),
  dtExM1: z.number(),
  atmIvM2: z.number(),
  atmFitIvM2: z.number(),
  atmFcstIvM2: z.number(),
  dtExM2: z.number(),
  atmIvM3: z.number(),
  atmFitIvM3: z.number(),
  atmFcstIvM3: z.number(),
  dtExM3: z.number(),
  atmIvM4: z.number(),
  atmFitIvM4: z.number(),
  atmFcstIvM4: z.number(),
  dtExM4: z.number(),
  iRate5wk: z.number(),
  iRateLt: z.number(),
  px1kGam: z.number(),
  volOfVol: z.number(),
  volOfIvol: z.number(),
  slope: z.number(),
  slopeInf: z.number(),
  slopeFcst: z.number(),
  slopeFcstInf: z.number(),
  deriv: z.number(),
  derivInf: z.number(),
  derivFcst: z.number(),
  derivFcstInf: z.number(),
  mktWidthVol: z.number(),
  mktWidthVolInf: z.number(),
  rip: z.number(),
  ivEarnReturn: z.number(),
  fcstR2: z.number(),
  fcstR2Imp: z.number(),
  stkVolu: z.number(),
  avgOptVolu20d: z.number(),
  sector: z.string(),
  orHv1d: z.number(),
  orHv5d: z.number(),
  orHv10d: z.number(),
  orHv20d: z.number(),
  orHv60d: z.number(),
  orHv90d: z.number(),
  orHv120d: z.number(),
  orHv252d: z.number(),
  orHv500d: z.number(),
  orHv1000d: z.number(),
  clsHv5d: z.number(),
  clsHv10d: z.number(),
  clsHv20d: z.number(),
  clsHv60d: z.number(),
  clsHv90d: z.number(),
  clsHv120d: z.number(),
  clsHv252d: z.number(),
  clsHv500d: z.number(),
  clsHv1000d: z.number(),
  clsPx1w: z.number(),
  stkPxChng1wk: z.number(),
  clsPx1m: z.number(),
  stkPxChng1m: z.number(),
  clsPx6m: z.number(),
  stkPxChng6m: z.number(),
  clsPx1y: z.number(),
  stkPxChng1y: z.number(),
  divFreq: z.number(),
  divYield: z.number(),
  divGrwth: z.number(),
  divDate: isoDate,
  divAmt: z.number(),
  nextErn: optionalDate,
  lastErn: isoDate,
  lastErnTod: z.number(),
  absAvgErnMv: z.number(),
  impliedIee: z.number(),
  tkOver: z.boolean(),
  etfIncl: z.string(),
  bestEtf: z.string(),
  sectorName: z.string(),
  correlSpy1m: z.number(),
  correlSpy1y: z.number(),
  correlEtf1m: z.number(),
  correlEtf1y: z.number(),
  beta1m: z.number(),
  beta1y: z.number(),
  ivPctile1m: z.number(),
  ivPctile1y: z.number(),
  ivPctileSpy: z.number(),
  ivPctileEtf: z.number(),
  ivStdvMean: z.number(),
  ivStdv1y: z.number(),
  ivSpyRatio: z.number(),
  ivSpyRatioAvg1m: z.number(),
  ivSpyRatioAvg1y: z.number(),
  ivSpyRatioStdv1y: z.number(),
  ivEtfRatio: z.number(),
  ivEtfRatioAvg1m: z.number(),
  ivEtfRatioAvg1y: z.number(),
  ivEtFratioStdv1y: z.number(),
  ivHvXernRatio: z.number(),
  ivHvXernRatio1m: z.number(),
  ivHvXernRatio1y: z.number(),
  ivHvXernRatioStdv1y: z.number(),
  etfIvHvXernRatio: z.number(),
  etfIvHvXernRatio1m: z.number(),
  etfIvHvXernRatio1y: z.number(),
  etfIvHvXernRatioStdv1y: z.number(),
  slopepctile: z.number(),
  slopeavg1m: z.number(),
  slopeavg1y: z.number(),
  slopeStdv1y: z.number(),
  etfSlopeRatio: z.number(),
  etfSlopeRatioAvg1m: z.number(),
  etfSlopeRatioAvg1y: z.number(),
  etfSlopeRatioAvgStdv1y: z.number(),
  impliedR2: z.number(),
  contango: z.number(),
  nextDiv: z.number(),
  impliedNextDiv: z.number(),
  annActDiv: z.number(),
  annIdiv: z.number(),
  borrow30: z.number(),
  borrow2yr: z.number(),
  error: z.number(),
  confidence: z.number(),
  pxCls: z.number(),
  wksNextErn: z.number(),
  oi: z.number(),
  straPxM1: z.number(),
  straPxM2: z.number(),
  smoothStraPxM1: z.number(),
  smoothStrPxM2: z.number(),
  fcstStraPxM1: z.number(),
  fcstStraPxM2: z.number(),
  loStrikeM1: z.number(),
  hiStrikeM1: z.number(),
  loStrikeM2: z.number(),
  hiStrikeM2: z.number(),
  ernDate1: usDate,
  ernDate2: usDate,
  ernDate3: usDate,
  ernDate4: usDate,
  ernDate5: usDate,
  ernDate6: usDate,
  ernDate7: usDate,
  ernDate8: usDate,
  ernDate9: usDate,
  ernDate10: usDate,
  ernDate11: usDate,
  ernDate12: usDate,
  ernMv1: z.number(),
  ernMv2: z.number(),
  ernMv3: z.number(),
  ernMv4: z.number(),
  ernMv5: z.number(),
  ernMv6: z.number(),
  ernMv7: z.number(),
  ernMv8: z.number(),
  ernMv9: z.number(),
  ernMv10: z.number(),
  ernMv11: z.number(),
  ernMv12: z.number(),
  ernStraPct1: z.number(),
  ernStraPct2: z.number(),
  ernStraPct3: z.number(),
  ernStraPct4: z.number(),
  ernStraPct5: z.number(),
  ernStraPct6: z.number(),
  ernStraPct7: z.number(),
  ernStraPct8: z.number(),
  ernStraPct9: z.number(),
  ernStraPct10: z.number(),
  ernStraPct11: z.number(),
  ernStraPct12: z.number(),
  ernEffct1: z.number(),
  ernEffct2: z.number(),
  ernEffct3: z.number(),
  ernEffct4: z.number(),
  ernEffct5: z.number(),
  ernEffct6: z.number(),
  ernEffct7: z.number(),
  ernEffct8: z.number(),
  ernEffct9: z.number(),
  ernEffct10: z.number(),
  ernEffct11: z.number(),
  ernEffct12: z.number(),
  orHvXern5d: z.number(),
  orHvXern10d: z.number(),
  orHvXern20d: z.number(),
  orHvXern60d: z.number(),
  orHvXern90d: z.number(),
  orHvXern120d: z.number(),
  orHvXern252d: z.number(),
  orHvXern500d: z.number(),
  orHvXern1000d: z.number(),
  clsHvXern5d: z.number(),
  clsHvXern10d: z.number(),
  clsHvXern20d: z.number(),
  clsHvXern60d: z.number(),
  clsHvXern90d: z.number(),
  clsHvXern120d: z.number(),
  clsHvXern252d: z.number(),
  clsHvXern500d: z.number(),
  clsHvXern1000d: z.number(),
  iv10d: z.number(),
  iv20d: z.number(),
  iv30d: z.number(),
  iv60d: z.number(),
  iv90d: z.number(),
  iv6m: z.number(),
  iv1yr: z.number(),
  fcstSlope: z.number(),
  fcstErnEffct: z.number(),
  ernMvStdv: z.number(),
  impliedEe: z.number(),
  impErnMv: z.number(),
  impMth2ErnMv: z.number(),
  fairVol90d: z.number(),
  fairXieeVol90d: z.number(),
  fairMth2XieeVol90d: z.number(),
  impErnMv90d: z.number(),
  impErnMvMth290d: z.number(),
  exErnIv10d: z.number(),
  exErnIv20d: z.number(),
  exErnIv30d: z.number(),
  exErnIv60d: z.number(),
  exErnIv90d: z.number(),
  exErnIv6m: z.number(),
  exErnIv1yr: z.number(),
  updatedAt: timestamp,
});

export const historicalVolatilitySchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  orHv1d: z.number(),
  orHv5d: z.number(),
  orHv10d: z.number(),
  orHv20d: z.number(),
  orHv30d: z.number(),
  orHv60d: z.number(),
  orHv90d: z.number(),
  orHv100d: z.number(),
  orHv120d: z.number(),
  orHv252d: z.number(),
  orHv500d: z.number(),
  orHv1000d: z.number(),
  clsHv5d: z.number(),
  clsHv10d: z.number(),
  clsHv20d: z.number(),
  clsHv30d: z.number(),
  clsHv60d: z.number(),
  clsHv90d: z.number(),
  clsHv100d: z.number(),
  clsHv120d: z.number(),
  clsHv252d: z.number(),
  clsHv500d: z.number(),
  clsHv1000d: z.number(),
  orHvXern5d: z.number(),
  orHvXern10d: z.number(),
  orHvXern20d: z.number(),
  orHvXern30d: z.number(),
  orHvXern60d: z.number(),
  orHvXern90d: z.number(),
  orHvXern100d: z.number(),
  orHvXern120d: z.number(),
  orHvXern252d: z.number(),
  orHvXern500d: z.number(),
  orHvXern1000d: z.number(),
  clsHvXern5d: z.number(),
  clsHvXern10d: z.number(),
  clsHvXern20d: z.number(),
  clsHvXern30d: z.number(),
  clsHvXern60d: z.number(),
  clsHvXern90d: z.number(),
  clsHvXern100d: z.number(),
  clsHvXern120d: z.number(),
  clsHvXern252d: z.number(),
  clsHvXern500d: z.number(),
  clsHvXern1000d: z.number(),
});

export const ivRankSchema = z.object({
  ticker: z.string(),
  tradeDate: isoDate,
  iv: z.number(),
  ivRank1m: z.number(),
  ivPct1m: z.number(),
  ivRank1y: z.number(),
  ivPct1y: z.number(),
  updatedAt: timestamp,
});

export type Ticker = z.output<typeof tickerSchema>;
export type DailyPrice = z.output<typeof dailyPriceSchema>;
export type DividendHistory = z.output<typeof dividendHistorySchema>;
export type EarningsHistory = z.output<typeof earningsHistorySchema>;
export type StockSplitHistory = z.output<typeof stockSplitHistorySchema>;
export type Strike = z.output<typeof strikeSchema>;
export type MoneyForecast = z.output<typeof moneyForecastSchema>;
export type MoneyImplied = z.output<typeof moneyImpliedSchema>;
export type Money = MoneyImplied | MoneyForecast;
export type Summary = z.output<typeof summarySchema>;
export type Core = z.output<typeof coreSchema>;
export type HistoricalVolatility = z.output<typeof historicalVolatilitySchema>;
export type IvRank = z.output<typeof ivRankSchema>;

/** Every Data API record carries the ticker it describes. */
export type DataApiRecord = { ticker: string };

/**
 * The envelope every Data API response shares. A `message` or `error` in
 * place of `data` reports a failure the HTTP status did not.
 */
export function envelopeOf<S extends z.ZodTypeAny>(record: S) {
  return z.object({
    data: z.array(record).optional(),
    message: z.string().nullish(),
    error: z.string().nullish(),
  });
}
