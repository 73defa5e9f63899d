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
 * 交易动作服务：下单（含杠杆设置）、撤单与账户查询
 */
import type { OrderDefaultsConfig } from "../config/agentConfig";
import type { OkxAttachAlgoOrder, OkxPlaceOrderRequest } from "../types/okx";
import { ValidationError } from "../utils/errors";
import { createLogger } from "../utils/loggerUtils";
import { inferInstrumentType, type MarketDataService } from "./marketData";
import type { CancelOrderParams, OkxClient, OrderHistoryParams } from "./okxClient";

const logger = createLogger({
  name: "trade-actions",
  level: "info",
});

export type TradeApi = Pick<
  OkxClient,
  | "placeOrder"
  | "cancelOrder"
  | "setLeverage"
  | "getOrderHistory"
  | "getAccountBalance"
  | "getPositions"
  | "getOpenOrders"
>;

export type PriceSource = Pick<MarketDataService, "getTicker">;

export interface OrderIntent {
  instId: string;
  tdMode: string;
  side: "buy" | "sell";
  posSide?: "long" | "short" | "net";
  ordType: string;
  sz: string;
  px?: string;
  lever?: string;
  slTriggerPx?: string;
  tpTriggerPx?: string;
  clOrdId?: string;
  reduceOnly?: boolean;
}

export interface DerivedTriggers {
  slTriggerPx: string;
  tpTriggerPx: string;
}

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

const PERCENT_DECIMALS = 8;
/** 百分比按 8 位小数定点后，再除以 100 得到比例的分母 */
const RATIO_SCALE = 10n ** BigInt(PERCENT_DECIMALS + 2);

/**
 * 百分比转换为定点整数（保留 8 位小数）
 */
function toScaledPercent(percent: number): bigint {
  return BigInt(percent.toFixed(PERCENT_DECIMALS).replace(".", ""));
}

/**
 * 非负整数除法，四舍五入
 */
function divideHalfUp(numerator: bigint, denominator: bigint): bigint {
  return (numerator * 2n + denominator) / (denominator * 2n);
}

function formatScaled(scaled: bigint, decimals: number): string {
  const digits = scaled.toString().padStart(decimals + 1, "0");
  if (decimals === 0) return digits;
  return `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}`;
}

/**
 * 按最新价的小数位数计算默认止损/止盈触发价（四舍五入）
 * 买入：止损 = 最新价 * (1 - sl%)，止盈 = 最新价 * (1 + tp%)；卖出方向相反
 */
export function deriveDefaultTriggers(
  last: string,
  side: OrderIntent["side"],
  defaults: OrderDefaultsConfig,
): DerivedTriggers | null {
  const trimmed = last.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const decimals = trimmed.split(".")[1]?.length ?? 0;
  const scaledLast = BigInt(trimmed.replace(".", ""));
  if (scaledLast <= 0n) return null;

  const slPercent = toScaledPercent(defaults.stopLossPercent);
  const tpPercent = toScaledPercent(defaults.takeProfitPercent);
  const below = (percent: bigint) => divideHalfUp(scaledLast * (RATIO_SCALE - percent), RATIO_SCALE);
  const above = (percent: bigint) => divideHalfUp(scaledLast * (RATIO_SCALE + percent), RATIO_SCALE);

  const sl = side === "buy" ? below(slPercent) : above(slPercent);
  const tp = side === "buy" ? above(tpPercent) : below(tpPercent);

  return {
    slTriggerPx: formatScaled(sl, decimals),
    tpTriggerPx: formatScaled(tp, decimals),
  };
}

/**
 * 触发价转换为 attachAlgoOrds，子订单以市价执行
 */
export function buildAttachAlgoOrders(slTriggerPx?: string, tpTriggerPx?: string): OkxAttachAlgoOrder[] {
  const attach: OkxAttachAlgoOrder[] = [];
  if (slTriggerPx) {
    attach.push({ slTriggerPx, slOrdPx: "-1" });
  }
  if (tpTriggerPx) {
    attach.push({ tpTriggerPx, tpOrdPx: "-1" });
  }
  return attach;
}

function requireFields(intent: Partial<OrderIntent>, fields: Array<keyof OrderIntent>): string[] {
  return fields.filter((field) => {
    const value = intent[field];
    return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
  });
}

export class TradeActionService {
  constructor(
    private readonly api: TradeApi,
    private readonly prices: PriceSource,
    private readonly defaults: OrderDefaultsConfig,
  ) {}

  async placeOrder(intent: OrderIntent) {
    const missing = requireFields(intent, ["instId", "tdMode", "side", "ordType", "sz"]);
    if (missing.length > 0) {
      throw new ValidationError(`Missing required order fields: ${missing.join(", ")}`, {
        toolName: "place_order",
        payload: intent,
      });
    }
    if (inferInstrumentType(intent.instId) === "SWAP" && !intent.posSide) {
      throw new ValidationError("posSide is required for SWAP instruments", {
        toolName: "place_order",
        payload: intent,
      });
    }
    if (intent.ordType === "limit" && !intent.px) {
      throw new ValidationError("px is required for limit orders", {
        toolName: "place_order",
        payload: intent,
      });
    }

    let { slTriggerPx, tpTriggerPx } = intent;
    if (!slTriggerPx && !tpTriggerPx) {
      const ticker = await this.prices.getTicker(intent.instId);
      const derived = ticker.last ? deriveDefaultTriggers(ticker.last, intent.side, this.defaults) : null;
      if (derived) {
        ({ slTriggerPx, tpTriggerPx } = derived);
        logger.info(`自动补齐 ${intent.instId} 止损/止盈`, {
          last: ticker.last,
          slTriggerPx,
          tpTriggerPx,
        });
      } else {
        logger.warn(`无法根据最新价补齐 ${intent.instId} 止损/止盈`, { last: ticker.last });
      }
    }

    if (intent.lever) {
      await this.api.setLeverage({
        lever: intent.lever,
        mgnMode: intent.tdMode,
        instId: intent.instId,
        posSide: intent.posSide,
      });
    }

    const order: OkxPlaceOrderRequest = {
      instId: intent.instId,
      tdMode: intent.tdMode,
      side: intent.side,
      ordType: intent.ordType,
      sz: intent.sz,
    };
    if (intent.posSide) order.posSide = intent.posSide;
    if (intent.px) order.px = intent.px;
    if (intent.clOrdId) order.clOrdId = intent.clOrdId;
    if (intent.reduceOnly !== undefined) order.reduceOnly = intent.reduceOnly;

    const attach = buildAttachAlgoOrders(slTriggerPx, tpTriggerPx);
    if (attach.length > 0) {
      order.attachAlgoOrds = attach;
    }

    logger.info(`提交订单 ${order.instId} ${order.side} ${order.sz}`, { ordType: order.ordType });
    return this.api.placeOrder(order);
  }

  async cancelOrder(params: CancelOrderParams) {
    if (!params.instId?.trim()) {
      throw new ValidationError("instId is required to cancel an order", {
        toolName: "cancel_order",
        payload: params,
      });
    }
    if (!params.ordId && !params.clOrdId) {
      throw new ValidationError("Either ordId or clOrdId must be provided to cancel an order", {
        toolName: "cancel_order",
        payload: params,
      });
    }
    return this.api.cancelOrder(params);
  }

  async getOrderHistory(filter: OrderHistoryParams = {}) {
    if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 1 || filter.limit > 100)) {
      throw new ValidationError("limit must be an integer between 1 and 100", {
        toolName: "get_order_history",
        payload: filter,
      });
    }
    return this.api.getOrderHistory(filter);
  }

  async getBalance() {
    return this.api.getAccountBalance();
  }

  async getPositions(instType?: string, instId?: string) {
    return this.api.getPositions(instType, instId);
  }

  async getOpenOrders(instType?: string) {
    return this.api.getOpenOrders(instType);
  }
}
