import { describe, expect, it, vi } from "vitest";
import { createAgentContext } from "../agentContext";
import { loadAgentConfig } from "../config/agentConfig";
import type { LlmClient } from "../services/llmClient";

describe("createAgentContext", () => {
  it("registers every trading tool and reuses the injected LLM client", () => {
    const config = loadAgentConfig({
      DEEPSEEK_API_KEY: "test-llm-key",
      OKX_API_KEY: "test-key",
      OKX_SECRET_KEY: "test-secret",
      OKX_PASSPHRASE: "test-pass",
      CONVERSATION_MAX_HISTORY: "8",
    });
    const llm: LlmClient = {
      complete: vi.fn(async () => ({ content: "ok", toolCalls: [], usage: {} })),
    };

    const context = createAgentContext(config, { llm, okx: { fetch: vi.fn<typeof fetch>() } });

    expect(context.tools.names()).toEqual([
      "get_ticker",
      "get_tickers",
      "get_candles",
      "get_order_book",
      "get_instrument_specs",
      "get_balance",
      "get_positions",
      "get_open_orders",
      "place_order",
      "cancel_order",
      "get_order_history",
    ]);
    expect(context.llm).toBe(llm);
    expect(context.conversations.maxHistory).toBe(8);
    expect(context.events.size).toBe(0);
  });
});
