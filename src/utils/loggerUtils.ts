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

import { createPinoLogger } from "@voltagent/logger";
import type { LevelWithSilent } from "pino";

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export type Logger = ReturnType<typeof createPinoLogger>;

export interface CreateLoggerOptions {
  name: string;
  level?: LevelWithSilent;
}

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 读取 LOG_LEVEL，非法值回退到 fallback
 */
export function resolveLogLevel(
  raw: string | undefined = process.env.LOG_LEVEL,
  fallback: LevelWithSilent = "info",
): LevelWithSilent {
  const value = raw?.trim().toLowerCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  return fallback;
}

/**
 * 创建模块日志实例
 * 环境变量 LOG_LEVEL 优先于调用方给出的默认级别
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  return createPinoLogger({
    name: options.name,
    level: resolveLogLevel(process.env.LOG_LEVEL, options.level ?? "info"),
  });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
