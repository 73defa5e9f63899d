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
 * Agent 事件 WebSocket：/agent/events/ws
 * 每个连接注册为事件订阅者，文本 ping 回复 pong
 */
import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import type { AgentEventHub, EventSubscriber } from "../services/agentEvents";
import { createLogger, describeError } from "../utils/loggerUtils";

const logger = createLogger({
  name: "agent-events-ws",
  level: "info",
});

export const AGENT_EVENTS_PATH = "/agent/events/ws";

function decodeFrame(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export function socketSubscriber(socket: WebSocket): EventSubscriber {
  return {
    id: randomUUID(),
    send: (message) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        socket.send(message, (error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function attachAgentEventSocket(server: Server, hub: AgentEventHub): WebSocketServer {
  const wss = new WebSocketServer({ server, path: AGENT_EVENTS_PATH });

  wss.on("connection", (socket) => {
    const subscriber = socketSubscriber(socket);
    hub.subscribe(subscriber).catch((error: unknown) => {
      logger.error("注册事件订阅失败", { error: describeError(error) });
      socket.close();
    });

    socket.on("message", (data) => {
      if (decodeFrame(data).trim().toLowerCase() === "ping") {
        socket.send("pong");
      }
    });

    socket.on("close", () => {
      hub.unsubscribe(subscriber).catch((error: unknown) => {
        logger.warn("注销事件订阅失败", { error: describeError(error) });
      });
    });

    socket.on("error", (error) => {
      logger.warn("事件 WebSocket 异常", { error: describeError(error) });
    });
  });

  return wss;
}
