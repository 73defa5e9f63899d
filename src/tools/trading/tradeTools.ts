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
 * 交易类工具
 * 模型只需给出基础字段与止盈止损触发价，attachAlgoOrds 由服务端拼装
 */
import { z } from "zod";
import type { TradeActionService } from "../../services/tradeActions";
import { defineTool } from "../toolRegistry";

export const PLACE_ORDER_TOOL = "place_order";

export const placeOrderParameters = z.object({
  instId: z.string().min(1).describe("交易产品 ID，例如 BTC-USDT-SWAP"),
  tdMode: z.string().min(1).describe("交易模式，cross/isolated/cash"),
  side: z.enum(["buy", "sell"]).describe("买卖方向，buy/sell"),
  posSide: z.enum(["long", "short", "net"]).optional().describe("持仓方向（long/short），SWAP 合约必填"),
  ordType: z.string().min(1).describe("订单类型，limit/market 等"),
  sz: z.string().min(1).describe("下单数量"),
  px: z.string().optional().describe("限价单价格，仅限价单填写"),
  lever: z.string().optional().describe("杠杆倍数，填写后会先设置杠杆再下单"),
  slTriggerPx: z.string().optional().describe("止损触发价"),
  tpTriggerPx: z.string().optional().describe("止盈触发价"),
  clOrdId: z.string().optional().describe("自定义订单 ID"),
  reduceOnly: z.boolean().optional().describe("是否只减仓"),
});

export function createTradeTools(tradeActions: TradeActionService) {
  const placeOrder = defineTool({
    name: PLACE_ORDER_TOOL,
    description:
      "提交交易订单。止损/止盈触发价都未填写时，系统会按最新价 ±1.5%（可配置）自动补齐，并以市价子订单挂载。",
    parameters: placeOrderParameters,
    execute: async (intent) => tradeActions.placeOrder(intent),
  });

  const cancelOrder = defineTool({
    name: "cancel_order",
    description: "撤销交易订单。instId 必填，ordId 与 clOrdId 至少提供一个。",
    parameters: z.object({
      instId: z.string().min(1).describe("交易产品 ID"),
      ordId: z.string().optional().describe("OKX 订单 ID"),
      clOrdId: z.string().optional().describe("客户端自定义订单 ID"),
    }),
    execute: async (params) => tradeActions.cancelOrder(params),
  });

  const getOrderHistory = defineTool({
    name: "get_order_history",
    description:
      "查询历史订单记录。可选 instType/instId/state/limit 过滤；不提供参数时返回最近的订单，limit 最大 100。",
    parameters: z.object({
      instType: z.string().optional().describe("产品类型，如 SWAP/SPOT"),
      instId: z.string().optional().describe("交易产品 ID"),
      state: z.string().optional().describe("订单状态过滤，例如 filled/canceled"),
      limit: z.number().int().min(1).max(100).optional().describe("返回条数，1-100"),
    }),
    execute: async (filter) => tradeActions.getOrderHistory(filter),
  });

  return [placeOrder, cancelOrder, getOrderHistory];
}
