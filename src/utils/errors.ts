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
 * Agent 异常体系
 */

export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 缺少必要配置（如 API 凭证）
 */
export class ConfigurationError extends AgentError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.missing = missing;
  }
}

/**
 * 外部服务（LLM / 交易所）返回错误或无法解析的响应
 */
export class ExternalServiceError extends AgentError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/**
 * HTTP 429
 */
export class RateLimitExceeded extends ExternalServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { status: 429, cause: options?.cause });
  }
}

export interface ValidationDetails {
  toolName?: string;
  payload?: unknown;
  issues?: string[];
}

/**
 * 参数校验失败：工具参数、下单字段、产品类型推断、撤单标识等
 */
export class ValidationError extends AgentError {
  readonly toolName?: string;
  readonly payload?: unknown;
  readonly issues: string[];

  constructor(message: string, details: ValidationDetails = {}) {
    super(message);
    this.toolName = details.toolName;
    this.payload = details.payload;
    this.issues = details.issues ?? [];
  }
}

export class UnknownToolError extends ValidationError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, { toolName });
  }
}
