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
 * 账户类工具
 */
import { z } from "zod";
import type { TradeActionService } from "../../services/tradeActions";
import { defineTool } from "../toolRegistry";

export function createAccountTools(tradeActions: TradeActionService) {
  const getBalance = defineTool({
    name: "get_balance",
    description: "查询账户余额与各币种可用保证金。",
    parameters: z.object({}),
    execute: async () => tradeActions.getBalance(),
  });

  const getPositions = defineTool({
    name: "get_positions",
    description: "查询当前持仓，可按产品类型或产品 ID 过滤。",
    parameters: z.object({
      instType: z.string().optional().describe("产品类型，例如 SWAP"),
      instId: z.string().optional().describe("交易产品 ID"),
    }),
    execute: async ({ instType, instId }) => tradeActions.getPositions(instType, instId),
  });

  const getOpenOrders = defineTool({
    name: "get_open_orders",
    description: "查询未成交订单。",
    parameters: z.object({
      instType: z.string().optional().describe("产品类型，例如 SWAP"),
    }),
    execute: async ({ instType }) => tradeActions.getOpenOrders(instType),
  });

  return [getBalance, getPositions, getOpenOrders];
}
