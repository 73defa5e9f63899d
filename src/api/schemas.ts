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
 * HTTP 请求体校验
 */
import { z } from "zod";

export const analysisRequestSchema = z.object({
  session_id: z.string().trim().min(1),
  instrument_id: z.string().trim().min(1).nullish(),
  analysis_type: z.string().trim().min(1).default("market_overview"),
  context: z.union([z.string(), z.record(z.unknown())]).nullish(),
  request_id: z.string().trim().min(1).optional(),
});

export const chatRequestSchema = z.object({
  session_id: z.string().trim().min(1),
  message: z.string().min(1),
  system_prompt: z.string().nullish(),
  use_history: z.boolean().default(true),
  history_limit: z.number().int().min(0).max(50).default(10),
});
