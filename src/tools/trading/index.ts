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
 * 交易工具集合
 */
import type { MarketDataService } from "../../services/marketData";
import type { TradeActionService } from "../../services/tradeActions";
import type { ToolDefinition } from "../toolRegistry";
import { createAccountTools } from "./accountTools";
import { createMarketTools } from "./marketTools";
import { createTradeTools } from "./tradeTools";

export { PLACE_ORDER_TOOL } from "./tradeTools";

export interface TradingToolDeps {
  marketData: MarketDataService;
  tradeActions: TradeActionService;
}

export function createTradingTools({ marketData, tradeActions }: TradingToolDeps): ToolDefinition[] {
  return [
    ...createMarketTools(marketData),
    ...createAccountTools(tradeActions),
    ...createTradeTools(tradeActions),
  ];
}
