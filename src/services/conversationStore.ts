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
 * 内存会话存储
 * 每个会话保留最近 maxHistory 条消息，超出后按先进先出淘汰；进程重启即丢失
 */
import { KeyedMutex } from "../utils/asyncLock";
import type { ChatMessage } from "./llmClient";

export const DEFAULT_CONVERSATION_MAX_HISTORY = 20;

export class ConversationStore {
  private readonly sessions = new Map<string, ChatMessage[]>();
  private readonly locks = new KeyedMutex();
  readonly maxHistory: number;

  constructor(maxHistory: number = DEFAULT_CONVERSATION_MAX_HISTORY) {
    this.maxHistory = Math.max(1, Math.floor(maxHistory));
  }

  async addMessage(sessionId: string, message: ChatMessage): Promise<void> {
    await this.locks.runExclusive(sessionId, () => {
      const messages = this.sessions.get(sessionId) ?? [];
      messages.push({ ...message });
      if (messages.length > this.maxHistory) {
        messages.splice(0, messages.length - this.maxHistory);
      }
      this.sessions.set(sessionId, messages);
    });
  }

  /**
   * 返回最近 limit 条消息（按时间升序）
   */
  async getHistory(sessionId: string, limit: number): Promise<ChatMessage[]> {
    return this.locks.runExclusive(sessionId, () => {
      const messages = this.sessions.get(sessionId);
      if (!messages || limit <= 0) return [];
      return messages.slice(-limit).map((message) => ({ ...message }));
    });
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.locks.runExclusive(sessionId, () => {
      this.sessions.delete(sessionId);
    });
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }
}
