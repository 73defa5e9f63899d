/**
 * open-nof1.ai - AI 加密货币自动交易系统
 * Copyright (C) 2025 195440
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import type { OkxRawCandle } from "../../types/okx";

export type IndicatorSeries = Array<number | null>;

export interface MacdSeries {
  dif: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
}

export interface OrderedSeries {
  timestamps: string[];
  closes: number[];
}

export interface IndicatorPayload {
  timestamp_series: string[];
  close_series: number[];
  ema20_series: IndicatorSeries;
  macd_series: IndicatorSeries;
  macd_dif_series: IndicatorSeries;
  macd_signal_series: IndicatorSeries;
  rsi7_series: IndicatorSeries;
  ema20: string | null;
  macd: string | null;
  macd_signal: string | null;
  macd_dif: string | null;
  rsi7: string | null;
}

const MACD_FAST = 12;
const MACD_SLOW = 26;
const MACD_SIGNAL = 9;

/**
 * EMA 序列，首值作为种子，前 period-1 个位置为 null
 */
export function calculateEmaSeries(values: number[], period: number): IndicatorSeries {
  if (!values.length) return [];
  const alpha = 2 / (period + 1);
  const result: IndicatorSeries = [];
  let ema = values[0];
  values.forEach((price, idx) => {
    if (idx > 0) {
      ema = (price - ema) * alpha + ema;
    }
    result.push(idx + 1 < period ? null : ema);
  });
  return result;
}

/**
 * MACD：DIF = EMA12 - EMA26，DEA = EMA9(DIF)，柱 = 2 * (DIF - DEA)
 * 第 26 根 K 线之前三条序列均为 null，DEA 以第一个 DIF 为种子
 */
export function calculateMacdSeries(values: number[]): MacdSeries {
  const dif: IndicatorSeries = [];
  const signal: IndicatorSeries = [];
  const histogram: IndicatorSeries = [];
  if (!values.length) return { dif, signal, histogram };

  const alphaFast = 2 / (MACD_FAST + 1);
  const alphaSlow = 2 / (MACD_SLOW + 1);
  const alphaSignal = 2 / (MACD_SIGNAL + 1);

  let emaFast = values[0];
  let emaSlow = values[0];
  let dea: number | null = null;

  values.forEach((price, idx) => {
    if (idx > 0) {
      emaFast = (price - emaFast) * alphaFast + emaFast;
      emaSlow = (price - emaSlow) * alphaSlow + emaSlow;
    }

    if (idx + 1 < MACD_SLOW) {
      dif.push(null);
      signal.push(null);
      histogram.push(null);
      return;
    }

    const currentDif = emaFast - emaSlow;
    const nextDea: number = dea === null ? currentDif : (currentDif - dea) * alphaSignal + dea;
    dea = nextDea;
    dif.push(currentDif);
    signal.push(nextDea);
    histogram.push(2 * (currentDif - nextDea));
  });

  return { dif, signal, histogram };
}

/**
 * RSI（Wilder 平滑）
 * 下标 < period 为累加阶段，下标 == period 给出第一个均值
 */
export function calculateRsiSeries(values: number[], period = 7): IndicatorSeries {
  if (!values.length) return [];
  const result: IndicatorSeries = values.map(() => null);
  let avgGain = 0;
  let avgLoss = 0;

  for (let idx = 1; idx < values.length; idx++) {
    const delta = values[idx] - values[idx - 1];
    const gain = Math.max(delta, 0);
    const loss = Math.max(-delta, 0);

    if (idx < period) {
      avgGain += gain;
      avgLoss += loss;
      continue;
    }

    if (idx === period) {
      avgGain = (avgGain + gain) / period;
      avgLoss = (avgLoss + loss) / period;
    } else {
      avgGain = (avgGain * (period - 1) + gain) / period;
      avgLoss = (avgLoss * (period - 1) + loss) / period;
    }

    if (avgLoss === 0) {
      result[idx] = 100;
    } else if (avgGain === 0) {
      result[idx] = 0;
    } else {
      result[idx] = 100 - 100 / (1 + avgGain / avgLoss);
    }
  }

  return result;
}

export function lastDefined(series: IndicatorSeries): number | null {
  for (let idx = series.length - 1; idx >= 0; idx--) {
    const value = series[idx];
    if (value !== null) return value;
  }
  return null;
}

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * 从 OKX 倒序 K 线中提取升序的时间戳与收盘价，跳过格式异常的记录
 */
export function extractOrderedSeries(rawCandles: OkxRawCandle[]): OrderedSeries {
  const timestamps: string[] = [];
  const closes: number[] = [];
  for (let idx = rawCandles.length - 1; idx >= 0; idx--) {
    const candle = rawCandles[idx];
    if (!Array.isArray(candle) || candle.length < 5) continue;
    const close = toFiniteNumber(candle[4]);
    if (close === null) continue;
    timestamps.push(String(candle[0]));
    closes.push(close);
  }
  return { timestamps, closes };
}

export function formatIndicatorValue(value: number | null): string | null {
  if (value === null) return null;
  return value.toFixed(8).replace(/0+$/, "").replace(/\.$/, "");
}

export function buildIndicatorPayload(rawCandles: OkxRawCandle[]): IndicatorPayload | null {
  if (!rawCandles.length) return null;

  const { timestamps, closes } = extractOrderedSeries(rawCandles);
  if (!closes.length) return null;

  const ema20 = calculateEmaSeries(closes, 20);
  const macd = calculateMacdSeries(closes);
  const rsi7 = calculateRsiSeries(closes, 7);

  return {
    timestamp_series: timestamps,
    close_series: closes,
    ema20_series: ema20,
    macd_series: macd.histogram,
    macd_dif_series: macd.dif,
    macd_signal_series: macd.signal,
    rsi7_series: rsi7,
    ema20: formatIndicatorValue(lastDefined(ema20)),
    macd: formatIndicatorValue(lastDefined(macd.histogram)),
    macd_signal: formatIndicatorValue(lastDefined(macd.signal)),
    macd_dif: formatIndicatorValue(lastDefined(macd.dif)),
    rsi7: formatIndicatorValue(lastDefined(rsi7)),
  };
}
