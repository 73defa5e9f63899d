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
 * 组装服务依赖：每个协作者只创建一次，通过构造函数注入
 */
import type { AgentConfig } from "./config/agentConfig";
import { AgentEventHub } from "./services/agentEvents";
import { ConversationStore } from "./services/conversationStore";
import { AiSdkLlmClient, type LlmClient } from "./services/llmClient";
import { MarketDataService } from "./services/marketData";
import { OkxClient, type OkxClientOptions } from "./services/okxClient";
import { StrategyAnalyzer } from "./services/strategyAnalyzer";
import { TradeActionService } from "./services/tradeActions";
import { ToolRegistry } from "./tools/toolRegistry";
import { createTradingTools } from "./tools/trading";

export interface AgentContext {
  config: AgentConfig;
  okx: OkxClient;
  marketData: MarketDataService;
  tradeActions: TradeActionService;
  tools: ToolRegistry;
  conversations: ConversationStore;
  events: AgentEventHub;
  llm: LlmClient;
  analyzer: StrategyAnalyzer;
}

export interface AgentContextOverrides {
  llm?: LlmClient;
  okx?: OkxClientOptions;
}

export function createAgentContext(config: AgentConfig, overrides: AgentContextOverrides = {}): AgentContext {
  const okx = new OkxClient(config.okx, overrides.okx);
  const marketData = new MarketDataService(okx);
  const tradeActions = new TradeActionService(okx, marketData, config.orderDefaults);
  const tools = new ToolRegistry().registerAll(createTradingTools({ marketData, tradeActions }));
  const conversations = new ConversationStore(config.conversationMaxHistory);
  const events = new AgentEventHub();
  const llm = overrides.llm ?? new AiSdkLlmClient(config.llm);
  const analyzer = new StrategyAnalyzer({
    llm,
    tools,
    conversations,
    events,
    config: config.analyzer,
  });

  return { config, okx, marketData, tradeActions, tools, conversations, events, llm, analyzer };
}
