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

import "dotenv/config";
import { Server } from "node:http";
import { serve, type ServerType } from "@hono/node-server";
import type { WebSocketServer } from "ws";
import { createAgentContext } from "./agentContext";
import { AGENT_EVENTS_PATH, attachAgentEventSocket } from "./api/agentEventsSocket";
import { createApiRoutes } from "./api/routes";
import { loadAgentConfig } from "./config/agentConfig";
import { createLogger, describeError } from "./utils/loggerUtils";

const logger = createLogger({
  name: "okx-trading-agent",
  level: "info",
});

let server: ServerType | null = null;
let eventSocket: WebSocketServer | null = null;

/**
 * 主函数
 */
async function main() {
  logger.info("启动 OKX 交易助手服务");

  const config = loadAgentConfig();
  const context = createAgentContext(config);

  logger.info(`已注册工具: ${context.tools.names().join(", ")}`);

  const app = createApiRoutes({
    analyzer: context.analyzer,
    conversations: context.conversations,
    marketData: context.marketData,
    tools: context.tools,
  });

  server = serve({
    fetch: app.fetch,
    hostname: config.host,
    port: config.port,
  });

  if (server instanceof Server) {
    eventSocket = attachAgentEventSocket(server, context.events);
  } else {
    logger.warn("当前服务器类型不支持事件 WebSocket");
  }

  logger.info(`Web 服务器已启动: http://${config.host}:${config.port}`);
  logger.info(`事件推送: ws://${config.host}:${config.port}${AGENT_EVENTS_PATH}`);
  logger.info(`LLM 模型: ${config.llm.model}（${config.llm.baseUrl}）`);
  logger.info(`OKX: ${config.okx.baseUrl}${config.okx.simulated ? "（模拟盘）" : ""}`);
  logger.info(`工具调用轮次上限: ${config.analyzer.maxToolIterations}`);
  logger.info("按 Ctrl+C 停止服务");
}

// 错误处理
process.on("uncaughtException", (error) => {
  logger.error("未捕获的异常:", { error: describeError(error) });
  process.exit(1);
});

process.on("unhandledRejection", (reason: unknown) => {
  logger.error("未处理的 Promise 拒绝:", { reason: describeError(reason) });
});

// 优雅退出处理
async function gracefulShutdown(signal: string) {
  logger.info(`收到 ${signal} 信号，正在关闭服务...`);

  try {
    if (eventSocket) {
      for (const client of eventSocket.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        eventSocket?.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info("事件 WebSocket 已关闭");
    }

    if (server) {
      logger.info("正在关闭 Web 服务器...");
      server.close();
      logger.info("Web 服务器已关闭");
    }

    logger.info("服务已安全关闭");
    process.exit(0);
  } catch (error) {
    logger.error("关闭服务时出错:", { error: describeError(error) });
    process.exit(1);
  }
}

// 监听退出信号
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

// 启动应用
try {
  await main();
} catch (error) {
  logger.error("启动失败:", { error: describeError(error) });
  process.exit(1);
}
