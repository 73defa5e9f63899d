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
 * LLM 客户端
 * 编排循环只依赖 LlmClient 接口；默认实现基于 ai SDK，通过 OpenAI 兼容协议访问 DeepSeek
 */
import { createOpenAI } from "@ai-sdk/openai";
import {
  APICallError,
  generateText,
  InvalidToolInputError,
  jsonSchema,
  tool,
  type LanguageModel,
  type ModelMessage,
  type ToolSet,
} from "ai";
import type { LlmConfig } from "../config/agentConfig";
import type { ToolSchema } from "../tools/toolRegistry";
import { ExternalServiceError, RateLimitExceeded, ValidationError } from "../utils/errors";
import { createLogger, describeError } from "../utils/loggerUtils";

const logger = createLogger({
  name: "llm-client",
  level: "info",
});

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ToolCallRequest {
  id: string;
  name: string;
  /** 模型输出的原始 JSON 字符串 */
  arguments: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCallRequest[];
}

export interface LlmUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface LlmCompletionRequest {
  messages: ChatMessage[];
  tools?: ToolSchema[];
  toolChoice?: "auto" | "none";
  temperature?: number;
}

export interface LlmCompletion {
  content: string;
  toolCalls: ToolCallRequest[];
  usage: LlmUsage;
}

export interface LlmClient {
  complete(request: LlmCompletionRequest): Promise<LlmCompletion>;
}

function decodeArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function encodeArguments(input: unknown): string {
  if (typeof input === "string") return input;
  return JSON.stringify(input ?? {});
}

/**
 * ChatMessage -> ai SDK ModelMessage
 */
export function toModelMessages(messages: ChatMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "user":
        return { role: "user", content: message.content };
      case "assistant": {
        const calls = message.toolCalls ?? [];
        if (calls.length === 0) {
          return { role: "assistant", content: message.content };
        }
        return {
          role: "assistant",
          content: [
            ...(message.content ? [{ type: "text" as const, text: message.content }] : []),
            ...calls.map((call) => ({
              type: "tool-call" as const,
              toolCallId: call.id,
              toolName: call.name,
              input: decodeArguments(call.arguments),
            })),
          ],
        };
      }
      case "tool":
        return {
          role: "tool",
          content: [
            {
              type: "tool-result",
              toolCallId: message.toolCallId ?? "",
              toolName: message.name ?? "",
              output: { type: "text", value: message.content },
            },
          ],
        };
    }
  });
}

/**
 * 开头连续的 system 消息合并为 system 提示词，其余消息保持原顺序
 */
export function splitSystemPrompt(messages: ChatMessage[]): { system?: string; messages: ChatMessage[] } {
  let idx = 0;
  while (idx < messages.length && messages[idx].role === "system") {
    idx++;
  }
  const leading = messages
    .slice(0, idx)
    .map((message) => message.content)
    .filter((content) => content.length > 0);
  return {
    system: leading.length > 0 ? leading.join("\n\n") : undefined,
    messages: messages.slice(idx),
  };
}

/**
 * 为每次 HTTP 请求单独计时；SDK 内部重试时每次尝试重新计时
 */
export function withRequestTimeout(timeoutMs: number, baseFetch: typeof fetch = fetch): typeof fetch {
  return (input, init) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
    return baseFetch(input, { ...init, signal });
  };
}

export function toToolSet(schemas: ToolSchema[]): ToolSet {
  const tools: ToolSet = {};
  for (const schema of schemas) {
    tools[schema.function.name] = tool({
      description: schema.function.description,
      inputSchema: jsonSchema(schema.function.parameters),
    });
  }
  return tools;
}

export interface AiSdkLlmClientOptions {
  model?: LanguageModel;
}

export class AiSdkLlmClient implements LlmClient {
  private readonly model: LanguageModel;
  private readonly config: LlmConfig;

  constructor(config: LlmConfig, options: AiSdkLlmClientOptions = {}) {
    this.config = config;
    if (options.model) {
      this.model = options.model;
    } else {
      const openai = createOpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        fetch: withRequestTimeout(config.timeoutMs),
      });
      this.model = openai.chat(config.model);
    }
  }

  async complete(request: LlmCompletionRequest): Promise<LlmCompletion> {
    const tools = request.tools && request.tools.length > 0 ? toToolSet(request.tools) : undefined;
    const { system, messages } = splitSystemPrompt(request.messages);

    try {
      const result = await generateText({
        model: this.model,
        system,
        messages: toModelMessages(messages),
        tools,
        toolChoice: tools ? (request.toolChoice ?? "auto") : undefined,
        temperature: request.temperature,
        maxRetries: this.config.maxRetries,
      });

      return {
        content: result.text,
        toolCalls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          arguments: encodeArguments(call.input),
        })),
        usage: {
          promptTokens: result.usage.inputTokens,
          completionTokens: result.usage.outputTokens,
          totalTokens: result.usage.totalTokens,
        },
      };
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): Error {
    if (InvalidToolInputError.isInstance(error)) {
      return new ValidationError(`Invalid tool input for ${error.toolName}`, {
        toolName: error.toolName,
        payload: error.toolInput,
      });
    }
    if (APICallError.isInstance(error)) {
      logger.error("LLM 接口调用失败", { status: error.statusCode, url: error.url });
      if (error.statusCode === 429) {
        return new RateLimitExceeded(`LLM rate limit exceeded: ${error.message}`, { cause: error });
      }
      return new ExternalServiceError(`LLM request failed: ${error.message}`, {
        status: error.statusCode,
        cause: error,
      });
    }
    logger.error(`LLM 请求异常: ${describeError(error)}`);
    return new ExternalServiceError(`LLM request failed: ${describeError(error)}`, { cause: error });
  }
}
