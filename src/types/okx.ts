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
 * OKX v5 REST 类型定义
 */

// OKX API 响应基础格式
export interface OkxResponse<T> {
  code: string;
  msg: string;
  data: T;
}

// K线原始记录：[ts, o, h, l, c, vol, volCcy, volCcyQuote, confirm]
// 交易所返回倒序（最新在前），个别记录可能字段缺失，因此按 unknown 处理
export type OkxRawCandle = unknown;

export type OkxOrderBookLevel = [string, string, string, string];

// 订单簿
export interface OkxOrderBook {
  asks: OkxOrderBookLevel[]; // 卖方深度 [价格, 数量, 已弃用, 订单数]
  bids: OkxOrderBookLevel[]; // 买方深度
  ts: string;
}

// 产品信息（只列出下单常用字段）
export interface OkxInstrument {
  instId: string;
  instType: string;
  uly?: string;
  baseCcy?: string;
  quoteCcy?: string;
  settleCcy?: string;
  ctVal?: string;      // 合约面值
  ctMult?: string;     // 合约乘数
  lever?: string;      // 最大杠杆倍数
  tickSz: string;      // 下单价格精度
  lotSz: string;       // 下单数量精度
  minSz: string;       // 最小下单数量
  state: string;
}

export interface OkxBalanceDetail {
  ccy: string;
  eq: string;          // 币种总权益
  cashBal?: string;
  availBal: string;    // 可用保证金
  frozenBal?: string;
  ordFrozen?: string;
  upl?: string;        // 未实现盈亏
}

// 账户余额
export interface OkxBalance {
  totalEq: string;
  adjEq?: string;
  imr?: string;
  mmr?: string;
  uTime?: string;
  details: OkxBalanceDetail[];
}

// 持仓信息
export interface OkxPosition {
  instId: string;
  instType: string;
  mgnMode: string;
  posSide: string;
  pos: string;
  avgPx: string;
  upl: string;
  uplRatio?: string;
  lever: string;
  liqPx?: string;
  markPx?: string;
  margin?: string;
}

// 订单信息
export interface OkxOrder {
  instId: string;
  instType: string;
  ordId: string;
  clOrdId?: string;
  px: string;
  sz: string;
  ordType: string;
  side: string;
  posSide?: string;
  tdMode: string;
  state: string;
  avgPx?: string;
  accFillSz?: string;
  lever?: string;
  cTime: string;
  uTime?: string;
}

// 止盈止损子订单；触发后以市价（-1）执行
export interface OkxAttachAlgoOrder {
  slTriggerPx?: string;
  slOrdPx?: string;
  tpTriggerPx?: string;
  tpOrdPx?: string;
}

// 下单请求体
export interface OkxPlaceOrderRequest {
  instId: string;
  tdMode: string;
  side: "buy" | "sell";
  posSide?: "long" | "short" | "net";
  ordType: string;
  sz: string;
  px?: string;
  clOrdId?: string;
  reduceOnly?: boolean;
  attachAlgoOrds?: OkxAttachAlgoOrder[];
}

// 下单/撤单回执
export interface OkxOrderAck {
  ordId: string;
  clOrdId?: string;
  tag?: string;
  sCode: string;
  sMsg: string;
}

export interface OkxSetLeverageRequest {
  lever: string;
  mgnMode: string;
  instId?: string;
  ccy?: string;
  posSide?: string;
}

export interface OkxLeverageInfo {
  instId: string;
  lever: string;
  mgnMode: string;
  posSide?: string;
}
