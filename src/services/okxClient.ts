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
 * OKX API 客户端封装
 */
import * as crypto from "node:crypto";
import type { OkxConfig } from "../config/agentConfig";
import type {
  OkxBalance,
  OkxInstrument,
  OkxLeverageInfo,
  OkxOrder,
  OkxOrderAck,
  OkxOrderBook,
  OkxPlaceOrderRequest,
  OkxPosition,
  OkxRawCandle,
  OkxResponse,
  OkxSetLeverageRequest,
} from "../types/okx";
import { ExternalServiceError, RateLimitExceeded } from "../utils/errors";
import { createLogger, describeError } from "../utils/loggerUtils";

const logger = createLogger({
  name: "okx-client",
  level: "info",
});

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | undefined | null>;

export interface RequestOptions {
  params?: QueryParams;
  body?: object;
  auth?: boolean;
}

export interface OkxClientOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface OrderHistoryParams {
  instType?: string;
  instId?: string;
  state?: string;
  limit?: number;
}

export interface CancelOrderParams {
  instId: string;
  ordId?: string;
  clOrdId?: string;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * 连接失败、超时属于可重试的传输层错误
 * fetch 在网络异常时抛出 TypeError，AbortSignal.timeout 触发 TimeoutError
 */
export function isTransientTransportError(error: unknown): boolean {
  if (error instanceof TypeError) return true;
  if (error instanceof Error) {
    return error.name === "TimeoutError" || error.name === "AbortError";
  }
  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function buildQueryString(params?: QueryParams): string {
  if (!params) return "";
  const entries = Object.entries(params).reduce<Record<string, string>>((acc, [key, value]) => {
    if (value !== undefined && value !== null && value !== "") {
      acc[key] = String(value);
    }
    return acc;
  }, {});
  if (Object.keys(entries).length === 0) return "";
  return "?" + new URLSearchParams(entries).toString();
}

/**
 * 提取业务错误详情：优先使用 data[0].sMsg / sCode
 */
function describeBusinessError(payload: Record<string, unknown>): string {
  const msg = typeof payload.msg === "string" ? payload.msg : "";
  const data = payload.data;
  if (Array.isArray(data) && data.length > 0 && isRecord(data[0])) {
    const first = data[0];
    if (typeof first.sMsg === "string" && first.sMsg) {
      return `${msg} - ${first.sMsg} (sCode: ${String(first.sCode)})`;
    }
  }
  return msg;
}

export class OkxClient {
  private readonly config: OkxConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(config: OkxConfig, options: OkxClientOptions = {}) {
    this.config = config;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());

    if (config.simulated) {
      logger.info("使用 OKX 模拟盘 (x-simulated-trading: 1)");
    } else {
      logger.info("使用 OKX 正式网");
    }
  }

  /**
   * 生成 OKX API 签名
   */
  sign(timestamp: string, method: string, requestPath: string, body: string = ""): string {
    const message = timestamp + method + requestPath + body;
    const hmac = crypto.createHmac("sha256", this.config.secretKey);
    hmac.update(message);
    return hmac.digest("base64");
  }

  /**
   * 发送 HTTP 请求
   * 仅对传输层错误做指数退避重试；HTTP 错误、限流与业务错误立即抛出
   */
  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<OkxResponse<T>> {
    const { params, body, auth = true } = options;
    const requestPath = path + buildQueryString(params);
    const bodyStr = body ? JSON.stringify(body) : "";
    const timestamp = this.now().toISOString();

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (auth) {
      headers["OK-ACCESS-KEY"] = this.config.apiKey;
      headers["OK-ACCESS-SIGN"] = this.sign(timestamp, method, requestPath, bodyStr);
      headers["OK-ACCESS-TIMESTAMP"] = timestamp;
      headers["OK-ACCESS-PASSPHRASE"] = this.config.passphrase;
    }
    if (this.config.simulated) {
      headers["x-simulated-trading"] = "1";
    }

    const url = this.config.baseUrl + requestPath;
    const totalAttempts = this.config.maxRetries + 1;
    let response: Response | undefined;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body: bodyStr || undefined,
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });
        break;
      } catch (error) {
        if (!isTransientTransportError(error)) {
          throw new ExternalServiceError(`OKX request failed: ${describeError(error)}`, { cause: error });
        }
        if (attempt >= totalAttempts) {
          logger.error(`OKX API 请求失败: ${method} ${path}`, { attempts: attempt, error: describeError(error) });
          throw new ExternalServiceError(
            `OKX request failed after ${this.config.maxRetries} retries: ${describeError(error)}`,
            { cause: error },
          );
        }
        const delay = this.config.retryBackoffMs * 2 ** (attempt - 1);
        logger.warn(`OKX 请求失败，重试 ${attempt}/${this.config.maxRetries}...`, {
          method,
          path,
          delay,
          error: describeError(error),
        });
        if (delay > 0) {
          await this.sleep(delay);
        }
      }
    }

    if (!response) {
      throw new ExternalServiceError(`OKX request failed without response: ${method} ${path}`);
    }

    const text = await response.text();

    if (response.status === 429) {
      throw new RateLimitExceeded(text || "OKX rate limit exceeded");
    }
    if (!response.ok) {
      throw new ExternalServiceError(`OKX responded with ${response.status}: ${text}`, {
        status: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new ExternalServiceError(`OKX returned unparseable body: ${text.slice(0, 200)}`, { cause: error });
    }
    if (!isRecord(payload)) {
      throw new ExternalServiceError(`OKX returned unexpected payload: ${text.slice(0, 200)}`);
    }

    // OKX API 返回格式: {code, msg, data}，HTTP 200 也可能携带业务错误
    if (payload.code !== "0" && payload.code !== 0) {
      logger.error(`OKX API 错误响应: ${method} ${path}`, {
        responseCode: payload.code,
        responseMsg: payload.msg,
      });
      throw new ExternalServiceError(
        `OKX business error: ${describeBusinessError(payload)} (code: ${String(payload.code)})`,
      );
    }

    return {
      code: String(payload.code),
      msg: typeof payload.msg === "string" ? payload.msg : "",
      data: payload.data as T,
    };
  }

  /**
   * 获取K线数据（公共接口，OKX 返回倒序）
   */
  async getCandles(instId: string, bar: string = "1m", limit: number = 100) {
    return this.request<OkxRawCandle[]>("GET", "/api/v5/market/candles", {
      params: { instId, bar, limit },
      auth: false,
    });
  }

  async getOrderBook(instId: string, depth: number = 5) {
    return this.request<OkxOrderBook[]>("GET", "/api/v5/market/books", {
      params: { instId, sz: depth },
      auth: false,
    });
  }

  /**
   * 获取产品信息（价格精度、数量精度等）
   */
  async getInstruments(instType: string, instId?: string, underlying?: string) {
    return this.request<OkxInstrument[]>("GET", "/api/v5/public/instruments", {
      params: { instType, instId, uly: underlying },
      auth: false,
    });
  }

  async getAccountBalance() {
    return this.request<OkxBalance[]>("GET", "/api/v5/account/balance");
  }

  async getPositions(instType?: string, instId?: string) {
    return this.request<OkxPosition[]>("GET", "/api/v5/account/positions", {
      params: { instType, instId },
    });
  }

  async getOpenOrders(instType?: string) {
    return this.request<OkxOrder[]>("GET", "/api/v5/trade/orders-pending", {
      params: { instType },
    });
  }

  async getOrderHistory(query: OrderHistoryParams = {}) {
    return this.request<OkxOrder[]>("GET", "/api/v5/trade/orders-history", {
      params: {
        instType: query.instType,
        instId: query.instId,
        state: query.state,
        limit: query.limit,
      },
    });
  }

  async placeOrder(order: OkxPlaceOrderRequest) {
    return this.request<OkxOrderAck[]>("POST", "/api/v5/trade/order", { body: order });
  }

  async setLeverage(payload: OkxSetLeverageRequest) {
    return this.request<OkxLeverageInfo[]>("POST", "/api/v5/account/set-leverage", { body: payload });
  }

  async cancelOrder(params: CancelOrderParams) {
    const body: CancelOrderParams = { instId: params.instId };
    if (params.ordId) body.ordId = params.ordId;
    if (params.clOrdId) body.clOrdId = params.clOrdId;
    return this.request<OkxOrderAck[]>("POST", "/api/v5/trade/cancel-order", { body });
  }
}
