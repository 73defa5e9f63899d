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
 * 策略分析器：LLM 与交易工具之间的多轮调用循环
 *
 * 每轮把当前消息列表发给模型；模型请求工具时按顺序逐个执行，
 * 将结果以 tool 消息（同一 toolCallId）追加后再次请求，直到模型不再调用工具或达到轮次上限。
 * 只有在循环正常结束后才写入会话历史并推送事件。
 */
import { randomUUID } from "node:crypto";
import type { AnalyzerConfig } from "../config/agentConfig";
import type { ToolRegistry } from "../tools/toolRegistry";
import { PLACE_ORDER_TOOL } from "../tools/trading";
import { createLogger, describeError } from "../utils/loggerUtils";
import type { AgentEvent, EventPublisher, OrderUpdateEvent } from "./agentEvents";
import type { ConversationStore } from "./conversationStore";
import type { ChatMessage, LlmClient, LlmUsage, ToolCallRequest } from "./llmClient";

const logger = createLogger({
  name: "strategy-analyzer",
  level: "info",
});

export const FALLBACK_SUMMARY = "No analysis generated.";
export const FALLBACK_REPLY = "No response generated.";

const ANALYSIS_SYSTEM_PROMPT = `你是一名经验丰富的加密货币量化交易分析师，服务于 OKX 永续合约交易。
你可以调用工具获取实时行情（含 EMA20、MACD、RSI7 指标）、订单簿、产品规格、账户余额、持仓与订单，并在必要时下单或撤单。
工作要求：
1. 结论必须基于工具返回的数据，不要编造价格；
2. 下单前先确认产品规格与账户可用保证金，SWAP 合约必须提供 posSide；
3. 最终回复给出简洁的市场判断，并以 "- " 开头逐条列出可执行建议。`;

export type ToolExecutor = Pick<ToolRegistry, "describe" | "execute">;

export interface StrategyAnalyzerDeps {
  llm: LlmClient;
  tools: ToolExecutor;
  conversations: ConversationStore;
  events: EventPublisher;
  config: AnalyzerConfig;
  now?: () => Date;
}

export interface AnalysisRequest {
  sessionId: string;
  instrumentId?: string | null;
  analysisType: string;
  context?: string | Record<string, unknown> | null;
  requestId?: string;
}

export interface AnalysisResponse {
  session_id: string;
  instrument_id: string | null;
  analysis_type: string;
  summary: string;
  suggestions: string[];
  created_at: string;
}

export interface ChatRequest {
  sessionId: string;
  message: string;
  systemPrompt?: string | null;
  useHistory?: boolean;
  historyLimit?: number;
}

export interface ChatUsage {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
}

export interface ChatResponse {
  session_id: string;
  reply: string;
  usage: ChatUsage;
  tool_calls: Array<{ id: string; name: string }>;
  created_at: string;
}

export type LoopTermination = "completed" | "iteration_cap";

export interface LoopOutcome {
  content: string;
  termination: LoopTermination;
  iterations: number;
  executedToolCalls: ToolCallRequest[];
  orderEvents: OrderUpdateEvent[];
  usage: ChatUsage;
}

export const DEFAULT_CHAT_HISTORY_LIMIT = 10;

const ORDER_ID_KEYS = ["ordId", "orderId", "order_id", "id"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  if (value === undefined || value === null || value === "") return null;
  return String(value);
}

function findOrderId(record: Record<string, unknown>): string | null {
  for (const key of ORDER_ID_KEYS) {
    const value = optionalString(record[key]);
    if (value) return value;
  }
  return null;
}

/**
 * 在顶层或 data[0] 中查找订单号
 */
export function extractOrderAck(result: unknown): { ordId: string; ack: Record<string, unknown> } | null {
  if (!isRecord(result)) return null;

  const topLevel = findOrderId(result);
  if (topLevel) return { ordId: topLevel, ack: result };

  const data = result.data;
  if (Array.isArray(data) && isRecord(data[0])) {
    const nested = findOrderId(data[0]);
    if (nested) return { ordId: nested, ack: data[0] };
  }
  return null;
}

function decodeToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    logger.debug(`订单参数无法解析: ${describeError(error)}`);
    return {};
  }
}

export function buildOrderUpdateEvent(
  call: ToolCallRequest,
  result: unknown,
  sessionId: string,
): OrderUpdateEvent | null {
  const found = extractOrderAck(result);
  if (!found) return null;

  const args = decodeToolArguments(call.arguments);
  return {
    type: "order_update",
    ordId: found.ordId,
    symbol: optionalString(args.instId),
    side: optionalString(args.side),
    order_type: optionalString(args.ordType),
    price: optionalString(args.px),
    size: optionalString(args.sz),
    filled_size: null,
    status: "submitted",
    metadata: {
      clOrdId: optionalString(found.ack.clOrdId) ?? optionalString(args.clOrdId),
      sCode: optionalString(found.ack.sCode),
      sMsg: optionalString(found.ack.sMsg),
      tool_call_id: call.id,
      session_id: sessionId,
    },
  };
}

/**
 * 提取以 "-"、"1"、"2"、"3" 开头的行作为建议
 */
export function extractSuggestions(summary: string): string[] {
  return summary
    .split(/\r?\n/)
    .filter((line) => /^[-123]/.test(line.trim()))
    .map((line) => line.replace(/^[- ]+|[- ]+$/g, "").trim())
    .filter((line) => line.length > 0);
}

function addTokens(current: number | null, next: number | undefined): number | null {
  if (next === undefined) return current;
  return (current ?? 0) + next;
}

function accumulateUsage(total: ChatUsage, usage: LlmUsage): ChatUsage {
  return {
    prompt_tokens: addTokens(total.prompt_tokens, usage.promptTokens),
    completion_tokens: addTokens(total.completion_tokens, usage.completionTokens),
    total_tokens: addTokens(total.total_tokens, usage.totalTokens),
  };
}

function formatContext(context: AnalysisRequest["context"]): string {
  if (context === undefined || context === null) return "无";
  if (typeof context === "string") return context.trim() || "无";
  return JSON.stringify(context);
}

export class StrategyAnalyzer {
  private readonly llm: LlmClient;
  private readonly tools: ToolExecutor;
  private readonly conversations: ConversationStore;
  private readonly events: EventPublisher;
  private readonly config: AnalyzerConfig;
  private readonly now: () => Date;

  constructor(deps: StrategyAnalyzerDeps) {
    this.llm = deps.llm;
    this.tools = deps.tools;
    this.conversations = deps.conversations;
    this.events = deps.events;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    const history = await this.conversations.getHistory(request.sessionId, this.config.historyLimit);

    const messages: ChatMessage[] = [{ role: "system", content: ANALYSIS_SYSTEM_PROMPT }, ...history];
    if (request.instrumentId) {
      messages.push({
        role: "system",
        content: `本次分析聚焦 ${request.instrumentId}，请先调用 get_ticker 获取最新行情与指标再下结论。`,
      });
    }
    messages.push({
      role: "user",
      content: `分析类型: ${request.analysisType}\n补充信息: ${formatContext(request.context)}`,
    });

    logger.info(`开始分析 session=${request.sessionId}`, {
      instrumentId: request.instrumentId ?? null,
      analysisType: request.analysisType,
      historyMessages: history.length,
    });

    const outcome = await this.runToolLoop(request.sessionId, messages, FALLBACK_SUMMARY);
    const summary = outcome.content;
    const suggestions = extractSuggestions(summary);

    await this.conversations.addMessage(request.sessionId, { role: "assistant", content: summary });

    for (const event of outcome.orderEvents) {
      await this.publishSafely(event);
    }
    await this.publishSafely({
      type: "analysis_result",
      request_id: request.requestId ?? randomUUID(),
      analysis: { summary, suggestions },
    });

    logger.info(`分析完成 session=${request.sessionId}`, {
      iterations: outcome.iterations,
      termination: outcome.termination,
      toolCalls: outcome.executedToolCalls.length,
      orders: outcome.orderEvents.length,
    });

    return {
      session_id: request.sessionId,
      instrument_id: request.instrumentId ?? null,
      analysis_type: request.analysisType,
      summary,
      suggestions,
      created_at: this.now().toISOString(),
    };
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const useHistory = request.useHistory ?? true;
    const history = useHistory
      ? await this.conversations.getHistory(request.sessionId, request.historyLimit ?? DEFAULT_CHAT_HISTORY_LIMIT)
      : [];

    const messages: ChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push(...history);
    const userMessage: ChatMessage = { role: "user", content: request.message };
    messages.push(userMessage);

    logger.info(`收到对话请求 session=${request.sessionId}`, {
      useHistory,
      historyMessages: history.length,
    });

    const outcome = await this.runToolLoop(request.sessionId, messages, FALLBACK_REPLY);

    await this.conversations.addMessage(request.sessionId, userMessage);
    await this.conversations.addMessage(request.sessionId, { role: "assistant", content: outcome.content });

    for (const event of outcome.orderEvents) {
      await this.publishSafely(event);
    }

    logger.info(`对话完成 session=${request.sessionId}`, {
      toolCalls: outcome.executedToolCalls.length,
      totalTokens: outcome.usage.total_tokens,
    });

    return {
      session_id: request.sessionId,
      reply: outcome.content,
      usage: outcome.usage,
      tool_calls: outcome.executedToolCalls.map((call) => ({ id: call.id, name: call.name })),
      created_at: this.now().toISOString(),
    };
  }

  /**
   * 工具调用循环
   * 轮次上限按模型请求次数计算；最后一轮请求的工具仍会执行，随后以最近一次非空回复结束
   */
  async runToolLoop(sessionId: string, messages: ChatMessage[], fallback: string): Promise<LoopOutcome> {
    const toolSchemas = this.tools.describe();
    const executedToolCalls: ToolCallRequest[] = [];
    const orderEvents: OrderUpdateEvent[] = [];
    let usage: ChatUsage = { prompt_tokens: null, completion_tokens: null, total_tokens: null };
    let lastContent = "";

    for (let iteration = 1; iteration <= this.config.maxToolIterations; iteration++) {
      const completion = await this.llm.complete({
        messages,
        tools: toolSchemas,
        toolChoice: "auto",
        temperature: this.config.temperature,
      });
      usage = accumulateUsage(usage, completion.usage);
      if (completion.content.trim()) {
        lastContent = completion.content;
      }

      if (completion.toolCalls.length === 0) {
        return {
          content: completion.content.trim() ? completion.content : lastContent || fallback,
          termination: "completed",
          iterations: iteration,
          executedToolCalls,
          orderEvents,
          usage,
        };
      }

      messages.push({
        role: "assistant",
        content: completion.content,
        toolCalls: completion.toolCalls,
      });

      for (const call of completion.toolCalls) {
        const result = await this.tools.execute(call.name, call.arguments);
        messages.push({
          role: "tool",
          name: call.name,
          toolCallId: call.id,
          content: JSON.stringify(result ?? null),
        });
        executedToolCalls.push(call);
        logger.info(`工具调用完成: ${call.name}`, { iteration, toolCallId: call.id });

        if (call.name === PLACE_ORDER_TOOL) {
          const event = buildOrderUpdateEvent(call, result, sessionId);
          if (event) {
            orderEvents.push(event);
          } else {
            logger.warn("下单结果中未找到订单号，跳过事件推送", { toolCallId: call.id });
          }
        }
      }
    }

    logger.warn(`工具调用达到轮次上限 ${this.config.maxToolIterations}，提前结束`, { sessionId });
    return {
      content: lastContent || fallback,
      termination: "iteration_cap",
      iterations: this.config.maxToolIterations,
      executedToolCalls,
      orderEvents,
      usage,
    };
  }

  private async publishSafely(event: AgentEvent): Promise<void> {
    try {
      await this.events.publish(event);
    } catch (error) {
      logger.error(`推送事件失败: ${event.type}`, { error: describeError(error) });
    }
  }
}
