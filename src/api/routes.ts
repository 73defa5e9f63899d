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
 * API 路由
 */
import { Hono, type Context } from "hono";
import type { z } from "zod";
import type { ConversationStore } from "../services/conversationStore";
import type { MarketDataService } from "../services/marketData";
import type { StrategyAnalyzer } from "../services/strategyAnalyzer";
import type { ToolRegistry } from "../tools/toolRegistry";
import { RateLimitExceeded, ValidationError } from "../utils/errors";
import { createLogger, describeError } from "../utils/loggerUtils";
import { analysisRequestSchema, chatRequestSchema } from "./schemas";

const logger = createLogger({
  name: "api-routes",
  level: "info",
});

export const SERVICE_NAME = "okx-trading-agent";

export interface ApiDeps {
  analyzer: Pick<StrategyAnalyzer, "analyze" | "chat">;
  conversations: ConversationStore;
  marketData: Pick<MarketDataService, "getTicker" | "getTickers">;
  tools: Pick<ToolRegistry, "describe">;
}

type ErrorStatus = 400 | 429 | 502;

export function errorStatus(error: unknown): ErrorStatus {
  if (error instanceof ValidationError) return 400;
  if (error instanceof RateLimitExceeded) return 429;
  return 502;
}

function respondError(c: Context, error: unknown) {
  const status = errorStatus(error);
  if (status === 502) {
    logger.error(`请求处理失败: ${c.req.method} ${c.req.path}`, { error: describeError(error) });
  } else {
    logger.warn(`请求被拒绝: ${c.req.method} ${c.req.path}`, { status, error: describeError(error) });
  }
  const body: { error: string; issues?: string[] } = { error: describeError(error) };
  if (error instanceof ValidationError && error.issues.length > 0) {
    body.issues = error.issues;
  }
  return c.json(body, status);
}

async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.infer<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (error) {
    throw new ValidationError("Request body must be valid JSON", { issues: [describeError(error)] });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError("Invalid request body", {
      payload: raw,
      issues: result.error.issues.map(
        (issue: z.ZodIssue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    });
  }
  return result.data;
}

export function createApiRoutes(deps: ApiDeps) {
  const app = new Hono();

  app.get("/", (c) => c.json({ service: SERVICE_NAME, status: "running" }));

  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  /**
   * 当前注册的工具描述（OpenAI function 格式）
   */
  app.get("/tools", (c) => c.json({ tools: deps.tools.describe() }));

  app.post("/analysis", async (c) => {
    try {
      const body = await parseBody(c, analysisRequestSchema);
      const result = await deps.analyzer.analyze({
        sessionId: body.session_id,
        instrumentId: body.instrument_id,
        analysisType: body.analysis_type,
        context: body.context,
        requestId: body.request_id,
      });
      return c.json(result);
    } catch (error) {
      return respondError(c, error);
    }
  });

  app.post("/chat", async (c) => {
    try {
      const body = await parseBody(c, chatRequestSchema);
      const result = await deps.analyzer.chat({
        sessionId: body.session_id,
        message: body.message,
        systemPrompt: body.system_prompt,
        useHistory: body.use_history,
        historyLimit: body.history_limit,
      });
      return c.json(result);
    } catch (error) {
      return respondError(c, error);
    }
  });

  app.get("/chat/:sessionId/history", async (c) => {
    const sessionId = c.req.param("sessionId");
    const limitParam = c.req.query("limit");
    const limit = limitParam ? Number.parseInt(limitParam, 10) : deps.conversations.maxHistory;
    if (!Number.isFinite(limit)) {
      return respondError(c, new ValidationError(`Invalid limit: ${limitParam}`));
    }
    const messages = await deps.conversations.getHistory(sessionId, limit);
    return c.json({ session_id: sessionId, messages });
  });

  app.delete("/chat/:sessionId", async (c) => {
    const sessionId = c.req.param("sessionId");
    await deps.conversations.clearSession(sessionId);
    return c.json({ session_id: sessionId, cleared: true });
  });

  app.get("/market/ticker", async (c) => {
    try {
      const instId = c.req.query("instId")?.trim();
      if (!instId) {
        throw new ValidationError("instId query parameter is required");
      }
      const ticker = await deps.marketData.getTicker(instId);
      return c.json({ data: [ticker] });
    } catch (error) {
      return respondError(c, error);
    }
  });

  /**
   * 批量行情：?instIds=BTC-USDT-SWAP,ETH-USDT-SWAP
   */
  app.get("/market/tickers", async (c) => {
    try {
      const instIds = (c.req.query("instIds") ?? "").split(",");
      const result = await deps.marketData.getTickers(instIds);
      return c.json(result);
    } catch (error) {
      return respondError(c, error);
    }
  });

  return app;
}
