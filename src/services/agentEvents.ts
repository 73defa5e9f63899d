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
 * Agent 事件推送
 * 订阅者集合由互斥锁保护；广播时对快照逐个发送，发送失败的订阅者会被移除
 */
import { Mutex } from "../utils/asyncLock";
import { createLogger, describeError } from "../utils/loggerUtils";

const logger = createLogger({
  name: "agent-events",
  level: "info",
});

export interface EventSubscriber {
  id: string;
  send(message: string): Promise<void> | void;
}

export interface OrderUpdateEvent {
  type: "order_update";
  ordId: string;
  symbol: string | null;
  side: string | null;
  order_type: string | null;
  price: string | null;
  size: string | null;
  filled_size: string | null;
  status: string;
  metadata: Record<string, unknown>;
}

export interface AnalysisResultEvent {
  type: "analysis_result";
  request_id: string;
  analysis: {
    summary: string;
    suggestions: string[];
  };
}

export type AgentEvent = OrderUpdateEvent | AnalysisResultEvent;

export interface EventPublisher {
  publish(event: AgentEvent): Promise<void>;
}

export class AgentEventHub implements EventPublisher {
  private readonly subscribers = new Set<EventSubscriber>();
  private readonly lock = new Mutex();

  async subscribe(subscriber: EventSubscriber): Promise<void> {
    await this.lock.runExclusive(() => {
      this.subscribers.add(subscriber);
    });
    logger.info(`事件订阅已建立: ${subscriber.id}`);
  }

  async unsubscribe(subscriber: EventSubscriber): Promise<void> {
    const removed = await this.lock.runExclusive(() => this.subscribers.delete(subscriber));
    if (removed) {
      logger.info(`事件订阅已关闭: ${subscriber.id}`);
    }
  }

  get size(): number {
    return this.subscribers.size;
  }

  async publish(event: AgentEvent): Promise<void> {
    const snapshot = await this.lock.runExclusive(() => [...this.subscribers]);
    if (snapshot.length === 0) return;

    const message = JSON.stringify(event);
    for (const subscriber of snapshot) {
      try {
        await subscriber.send(message);
      } catch (error) {
        logger.warn(`推送事件失败，移除订阅者 ${subscriber.id}`, { error: describeError(error) });
        await this.unsubscribe(subscriber);
      }
    }
  }
}
