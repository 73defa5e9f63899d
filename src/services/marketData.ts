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

import type { OkxClient } from "./okxClient";
import { buildIndicatorPayload, type IndicatorPayload } from "./indicators/indicatorMath";
import { ExternalServiceError, ValidationError } from "../utils/errors";
import { createLogger, describeError } from "../utils/loggerUtils";

const logger = createLogger({
  name: "market-data",
  level: "info",
});

export const DEFAULT_TICKER_BAR = "3m";
export const INDICATOR_CANDLE_LIMIT = 60;

export type MarketDataApi = Pick<OkxClient, "getCandles" | "getOrderBook" | "getInstruments">;

export interface TickerBase {
  instType: string;
  instId: string;
  bar: string;
  source: "candles";
  ts: string;
  last: string | null;
  open: string | null;
  high: string | null;
  low: string | null;
  vol: string | null;
  volCcy: string | null;
  volCcyQuote: string | null;
  confirm: string | null;
}

export type TickerSnapshot = TickerBase & Partial<IndicatorPayload>;

export interface TickerBatchResult {
  data: TickerSnapshot[];
  failed: number;
  errors: Array<{ instId: string; error: string }>;
}

/**
 * 根据产品 ID 末段推断产品类型：BTC-USDT-SWAP -> SWAP
 */
export function inferInstrumentType(instId: string): string | null {
  if (!instId.includes("-")) return null;
  const segments = instId.split("-");
  const last = segments[segments.length - 1]?.trim();
  return last ? last.toUpperCase() : null;
}

function cell(candle: unknown[], index: number): string | null {
  const value = candle[index];
  return value === undefined || value === null ? null : String(value);
}

/**
 * 行情数据服务
 * ticker 由最近 60 根 3m K 线投影而来，并附带 EMA/MACD/RSI 指标
 */
export class MarketDataService {
  constructor(private readonly api: MarketDataApi) {}

  async getTicker(instId: string): Promise<TickerSnapshot> {
    const response = await this.api.getCandles(instId, DEFAULT_TICKER_BAR, INDICATOR_CANDLE_LIMIT);
    const rawCandles = Array.isArray(response.data) ? response.data : [];

    if (rawCandles.length === 0) {
      throw new ExternalServiceError(
        `OKX candles returned empty data for ${instId} (${DEFAULT_TICKER_BAR})`,
      );
    }

    const latest = rawCandles[0];
    if (!Array.isArray(latest) || latest.length < 5) {
      throw new ExternalServiceError(`Unexpected candle payload: ${JSON.stringify(latest)}`);
    }

    const snapshot: TickerSnapshot = {
      instType: inferInstrumentType(instId) ?? "SWAP",
      instId,
      bar: DEFAULT_TICKER_BAR,
      source: "candles",
      ts: cell(latest, 0) ?? new Date().toISOString(),
      last: cell(latest, 4),
      open: cell(latest, 1),
      high: cell(latest, 2),
      low: cell(latest, 3),
      vol: cell(latest, 5),
      volCcy: cell(latest, 6),
      volCcyQuote: cell(latest, 7),
      confirm: cell(latest, 8),
    };

    const indicators = buildIndicatorPayload(rawCandles);
    return indicators ? { ...snapshot, ...indicators } : snapshot;
  }

  /**
   * 并发查询多个产品，单个失败不影响其余结果
   * 全部失败时视为终态错误
   */
  async getTickers(instIds: string[]): Promise<TickerBatchResult> {
    const unique = [...new Set(instIds.map((id) => id.trim()).filter(Boolean))];
    if (unique.length === 0) {
      throw new ValidationError("At least one instrument id is required");
    }

    const settled = await Promise.allSettled(unique.map((instId) => this.getTicker(instId)));
    const data: TickerSnapshot[] = [];
    const errors: TickerBatchResult["errors"] = [];

    settled.forEach((result, idx) => {
      if (result.status === "fulfilled") {
        data.push(result.value);
      } else {
        errors.push({ instId: unique[idx], error: describeError(result.reason) });
      }
    });

    if (errors.length > 0) {
      logger.warn(`批量获取行情部分失败 ${errors.length}/${unique.length}`, { errors });
    }
    if (data.length === 0) {
      throw new ExternalServiceError(
        `All ticker requests failed: ${errors.map((e) => `${e.instId}: ${e.error}`).join("; ")}`,
      );
    }

    return { data, failed: errors.length, errors };
  }

  async getCandles(instId: string, bar: string = "1m", limit: number = 100) {
    return this.api.getCandles(instId, bar, limit);
  }

  async getOrderBook(instId: string, depth: number = 5) {
    return this.api.getOrderBook(instId, depth);
  }

  async getInstrumentSpecs(instId: string, instType?: string) {
    const resolvedType = instType?.trim() ? instType.trim().toUpperCase() : inferInstrumentType(instId);
    if (!resolvedType) {
      throw new ValidationError(
        `Cannot infer instrument type from "${instId}"; provide instType explicitly`,
        { payload: { instId } },
      );
    }
    return this.api.getInstruments(resolvedType, instId);
  }
}
