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

/**
 * 行情类工具
 */
import { z } from "zod";
import type { MarketDataService } from "../../services/marketData";
import { defineTool } from "../toolRegistry";

const instIdSchema = z.string().min(1).describe("交易产品 ID，例如 BTC-USDT-SWAP");

export function createMarketTools(marketData: MarketDataService) {
  const getTicker = defineTool({
    name: "get_ticker",
    description:
      "获取单个产品的最新行情快照（基于最近 60 根 3m K 线），包含 last/open/high/low/vol 以及 EMA20、MACD、RSI7 指标序列与最新值。",
    parameters: z.object({
      instId: instIdSchema,
    }),
    execute: async ({ instId }) => {
      const ticker = await marketData.getTicker(instId);
      return { code: "0", msg: "", data: [ticker] };
    },
  });

  const getTickers = defineTool({
    name: "get_tickers",
    description:
      "批量获取多个产品的行情快照。部分产品失败时返回成功部分，并在 errors 中列出失败原因；全部失败时报错。",
    parameters: z.object({
      instIds: z.array(instIdSchema).min(1).describe("交易产品 ID 列表"),
    }),
    execute: async ({ instIds }) => marketData.getTickers(instIds),
  });

  const getCandles = defineTool({
    name: "get_candles",
    description: "获取K线数据（OKX 原始格式，最新在前）。",
    parameters: z.object({
      instId: instIdSchema,
      bar: z.string().default("1m").describe("K线周期，例如 1m/3m/15m/1H/4H"),
      limit: z.number().int().min(1).max(300).default(100).describe("返回条数，最大 300"),
    }),
    execute: async ({ instId, bar, limit }) => marketData.getCandles(instId, bar, limit),
  });

  const getOrderBook = defineTool({
    name: "get_order_book",
    description: "获取订单簿深度（asks/bids）。",
    parameters: z.object({
      instId: instIdSchema,
      depth: z.number().int().min(1).max(400).default(5).describe("深度档位数"),
    }),
    execute: async ({ instId, depth }) => marketData.getOrderBook(instId, depth),
  });

  const getInstrumentSpecs = defineTool({
    name: "get_instrument_specs",
    description:
      "获取产品规格：价格精度 tickSz、数量精度 lotSz、最小下单量 minSz、合约面值 ctVal 等。未提供 instType 时根据 instId 末段推断。",
    parameters: z.object({
      instId: instIdSchema,
      instType: z.string().optional().describe("产品类型，例如 SWAP/SPOT/FUTURES"),
    }),
    execute: async ({ instId, instType }) => marketData.getInstrumentSpecs(instId, instType),
  });

  return [getTicker, getTickers, getCandles, getOrderBook, getInstrumentSpecs];
}
