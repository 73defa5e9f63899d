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
 * Agent 服务配置
 */
import { ConfigurationError } from "../utils/errors";

type Env = Record<string, string | undefined>;

export interface LlmConfig {
	apiKey: string;
	/**
	 * OpenAI 兼容接口地址，统一补齐 /v1 后缀
	 */
	baseUrl: string;
	model: string;
	/**
	 * 单次 LLM 调用的超时时间（毫秒）
	 */
	timeoutMs: number;
	/**
	 * LLM 客户端内部的重试次数（编排循环本身不重试）
	 */
	maxRetries: number;
}

export interface OkxConfig {
	apiKey: string;
	secretKey: string;
	passphrase: string;
	baseUrl: string;
	/**
	 * 是否附带 x-simulated-trading: 1（模拟盘）
	 */
	simulated: boolean;
	maxRetries: number;
	/**
	 * 指数退避的基础延迟（毫秒），第 n 次重试等待 base * 2^(n-1)
	 */
	retryBackoffMs: number;
	timeoutMs: number;
}

export interface AnalyzerConfig {
	/**
	 * 单次请求内 LLM 调用次数上限
	 */
	maxToolIterations: number;
	/**
	 * 分析请求带入的历史消息条数
	 */
	historyLimit: number;
	temperature: number;
}

export interface OrderDefaultsConfig {
	/**
	 * 未给出触发价时自动补齐的止损百分比
	 */
	stopLossPercent: number;
	/**
	 * 未给出触发价时自动补齐的止盈百分比
	 */
	takeProfitPercent: number;
}

export interface AgentConfig {
	host: string;
	port: number;
	conversationMaxHistory: number;
	llm: LlmConfig;
	okx: OkxConfig;
	analyzer: AnalyzerConfig;
	orderDefaults: OrderDefaultsConfig;
}

const DEFAULT_PORT = 8001;
const DEFAULT_MAX_TOOL_ITERATIONS = 10;
const DEFAULT_HISTORY_LIMIT = 5;
const DEFAULT_CONVERSATION_MAX_HISTORY = 20;
const DEFAULT_ORDER_BAND_PERCENT = 1.5;

function parseInteger(value: string | undefined, fallback: number): number {
	if (!value) {
		return fallback;
	}
	const parsed = Number.parseInt(value, 10);
	return Number.isFinite(parsed) ? parsed : fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
	if (!value) {
		return fallback;
	}
	const parsed = Number.parseFloat(value);
	return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
	if (!value) {
		return fallback;
	}
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function clamp(value: number, min: number, max: number): number {
	if (value < min) {
		return min;
	}
	if (value > max) {
		return max;
	}
	return value;
}

function firstDefined(env: Env, keys: string[]): string | undefined {
	for (const key of keys) {
		const value = env[key]?.trim();
		if (value) {
			return value;
		}
	}
	return undefined;
}

export function normalizeLlmBaseUrl(raw: string): string {
	const trimmed = raw.replace(/\/+$/, "");
	return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

/**
 * 读取并校验服务配置
 * 缺少 LLM 或 OKX 凭证时抛出 ConfigurationError，列出全部缺失项
 */
export function loadAgentConfig(env: Env = process.env): AgentConfig {
	const credentials = {
		DEEPSEEK_API_KEY: firstDefined(env, ["DEEPSEEK_API_KEY"]),
		OKX_API_KEY: firstDefined(env, ["OKX_API_KEY", "OKX_SIM_API_KEY"]),
		OKX_SECRET_KEY: firstDefined(env, ["OKX_SECRET_KEY", "OKX_SIM_API_SECRET"]),
		OKX_PASSPHRASE: firstDefined(env, ["OKX_PASSPHRASE", "OKX_SIM_PASSPHRASE"]),
	};

	const missing = Object.entries(credentials)
		.filter(([, value]) => !value)
		.map(([key]) => key);
	if (missing.length > 0) {
		throw new ConfigurationError(
			`Missing required configuration: ${missing.join(", ")}`,
			missing,
		);
	}

	return {
		host: env.AGENT_HOST || "0.0.0.0",
		port: parseInteger(env.PORT ?? env.AGENT_PORT, DEFAULT_PORT),
		conversationMaxHistory: Math.max(
			1,
			parseInteger(env.CONVERSATION_MAX_HISTORY, DEFAULT_CONVERSATION_MAX_HISTORY),
		),
		llm: {
			apiKey: credentials.DEEPSEEK_API_KEY ?? "",
			baseUrl: normalizeLlmBaseUrl(env.DEEPSEEK_API_BASE || "https://api.deepseek.com"),
			model: env.AI_MODEL_NAME || "deepseek-chat",
			timeoutMs: Math.max(1000, parseInteger(env.LLM_TIMEOUT_MS, 60_000)),
			maxRetries: clamp(parseInteger(env.LLM_MAX_RETRIES, 2), 0, 10),
		},
		okx: {
			apiKey: credentials.OKX_API_KEY ?? "",
			secretKey: credentials.OKX_SECRET_KEY ?? "",
			passphrase: credentials.OKX_PASSPHRASE ?? "",
			baseUrl: (env.OKX_BASE_URL || "https://www.okx.com").replace(/\/+$/, ""),
			simulated: parseBoolean(env.OKX_USE_SIMULATED, false),
			maxRetries: clamp(parseInteger(env.OKX_HTTP_MAX_RETRIES, 3), 0, 10),
			retryBackoffMs: Math.max(0, parseInteger(env.OKX_HTTP_RETRY_BACKOFF_MS, 500)),
			timeoutMs: Math.max(1000, parseInteger(env.OKX_HTTP_TIMEOUT_MS, 15_000)),
		},
		analyzer: {
			maxToolIterations: clamp(
				parseInteger(env.AGENT_MAX_TOOL_ITERATIONS, DEFAULT_MAX_TOOL_ITERATIONS),
				1,
				50,
			),
			historyLimit: Math.max(0, parseInteger(env.ANALYSIS_HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT)),
			temperature: clamp(parseNumber(env.ANALYSIS_TEMPERATURE, 0.4), 0, 2),
		},
		orderDefaults: {
			stopLossPercent: clamp(
				parseNumber(env.ORDER_DEFAULT_STOP_LOSS_PERCENT, DEFAULT_ORDER_BAND_PERCENT),
				0,
				100,
			),
			takeProfitPercent: clamp(
				parseNumber(env.ORDER_DEFAULT_TAKE_PROFIT_PERCENT, DEFAULT_ORDER_BAND_PERCENT),
				0,
				100,
			),
		},
	};
}
