import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import type { AnalyzerConfig } from "../../config/agentConfig";
import { defineTool, ToolRegistry } from "../../tools/toolRegistry";
import { placeOrderParameters } from "../../tools/trading/tradeTools";
import { ExternalServiceError, ValidationError } from "../../utils/errors";
import type { AgentEvent, EventPublisher } from "../agentEvents";
import { ConversationStore } from "../conversationStore";
import type { ChatMessage, LlmClient, LlmCompletion, LlmCompletionRequest, ToolCallRequest } from "../llmClient";
import {
  buildOrderUpdateEvent,
  extractOrderAck,
  extractSuggestions,
  FALLBACK_SUMMARY,
  StrategyAnalyzer,
} from "../strategyAnalyzer";

const FIXED_NOW = new Date("2024-05-01T08:00:00.000Z");

const analyzerConfig: AnalyzerConfig = {
  maxToolIterations: 3,
  historyLimit: 5,
  temperature: 0.4,
};

function answer(content: string, usage: LlmCompletion["usage"] = {}): LlmCompletion {
  return { content, toolCalls: [], usage };
}

function callTools(toolCalls: ToolCallRequest[], content = ""): LlmCompletion {
  return { content, toolCalls, usage: {} };
}

class ScriptedLlm implements LlmClient {
  readonly requests: LlmCompletionRequest[] = [];
  private turn = 0;

  constructor(private readonly script: (turn: number) => LlmCompletion | Promise<LlmCompletion>) {}

  async complete(request: LlmCompletionRequest): Promise<LlmCompletion> {
    this.requests.push({ ...request, messages: [...request.messages] });
    this.turn += 1;
    return this.script(this.turn);
  }
}

class RecordingPublisher implements EventPublisher {
  readonly published: AgentEvent[] = [];

  async publish(event: AgentEvent): Promise<void> {
    this.published.push(event);
  }
}

function createTools(orderAck: unknown = { code: "0", msg: "", data: [{ ordId: "ord-1", clOrdId: "c-1", sCode: "0", sMsg: "" }] }) {
  const getTicker = vi.fn(async ({ instId }: { instId: string }) => ({ instId, last: "100" }));
  const placeOrder = vi.fn(async () => orderAck);
  const registry = new ToolRegistry()
    .register(
      defineTool({
        name: "get_ticker",
        description: "行情",
        parameters: z.object({ instId: z.string() }),
        execute: getTicker,
      }),
    )
    .register(
      defineTool({
        name: "place_order",
        description: "下单",
        parameters: placeOrderParameters,
        execute: placeOrder,
      }),
    );
  return { registry, getTicker, placeOrder };
}

function createAnalyzer(llm: LlmClient, options: { orderAck?: unknown; events?: EventPublisher } = {}) {
  const { registry, getTicker, placeOrder } = createTools(options.orderAck);
  const conversations = new ConversationStore(20);
  const events = options.events ?? new RecordingPublisher();
  const analyzer = new StrategyAnalyzer({
    llm,
    tools: registry,
    conversations,
    events,
    config: analyzerConfig,
    now: () => FIXED_NOW,
  });
  return { analyzer, conversations, events, registry, getTicker, placeOrder };
}

const tickerCall: ToolCallRequest = { id: "call-1", name: "get_ticker", arguments: '{"instId":"BTC-USDT-SWAP"}' };

const orderCall: ToolCallRequest = {
  id: "call-order",
  name: "place_order",
  arguments: JSON.stringify({
    instId: "BTC-USDT-SWAP",
    tdMode: "cross",
    side: "buy",
    posSide: "long",
    ordType: "limit",
    sz: "1",
    px: "100",
  }),
};

describe("StrategyAnalyzer.analyze", () => {
  it("returns the summary and list-item suggestions when no tools are requested", async () => {
    const llm = new ScriptedLlm(() => answer("BTC looks strong\n- Buy the dip\n2. Watch 60000\nNote"));
    const { analyzer, conversations, events } = createAnalyzer(llm);

    const result = await analyzer.analyze({
      sessionId: "s1",
      instrumentId: "BTC-USDT-SWAP",
      analysisType: "trend",
      requestId: "req-1",
    });

    expect(result).toEqual({
      session_id: "s1",
      instrument_id: "BTC-USDT-SWAP",
      analysis_type: "trend",
      summary: "BTC looks strong\n- Buy the dip\n2. Watch 60000\nNote",
      suggestions: ["Buy the dip", "2. Watch 60000"],
      created_at: "2024-05-01T08:00:00.000Z",
    });
    expect(await conversations.getHistory("s1", 10)).toEqual([
      { role: "assistant", content: "BTC looks strong\n- Buy the dip\n2. Watch 60000\nNote" },
    ]);
    expect(events).toBeInstanceOf(RecordingPublisher);
    if (events instanceof RecordingPublisher) {
      expect(events.published).toEqual([
        {
          type: "analysis_result",
          request_id: "req-1",
          analysis: { summary: result.summary, suggestions: result.suggestions },
        },
      ]);
    }
  });

  it("builds the prompt from system prompt, history, focus and task", async () => {
    const llm = new ScriptedLlm(() => answer("done"));
    const { analyzer, conversations, registry } = createAnalyzer(llm);
    await conversations.addMessage("s1", { role: "user", content: "earlier question" });
    await conversations.addMessage("s1", { role: "assistant", content: "earlier answer" });

    await analyzer.analyze({ sessionId: "s1", instrumentId: "ETH-USDT-SWAP", analysisType: "momentum" });

    const [request] = llm.requests;
    expect(request.messages.map((message) => message.role)).toEqual(["system", "user", "assistant", "system", "user"]);
    expect(request.messages[1].content).toBe("earlier question");
    expect(request.messages[3].content).toContain("ETH-USDT-SWAP");
    expect(request.messages[4].content).toBe("分析类型: momentum\n补充信息: 无");
    expect(request.tools).toEqual(registry.describe());
    expect(request.toolChoice).toBe("auto");
    expect(request.temperature).toBe(0.4);
  });

  it("omits the focus instruction without an instrument and serialises object context", async () => {
    const llm = new ScriptedLlm(() => answer("done"));
    const { analyzer } = createAnalyzer(llm);

    await analyzer.analyze({ sessionId: "s1", analysisType: "risk", context: { horizon: "4h" } });

    const messages = llm.requests[0].messages;
    expect(messages.map((message) => message.role)).toEqual(["system", "user"]);
    expect(messages[1].content).toBe('分析类型: risk\n补充信息: {"horizon":"4h"}');
  });

  it("feeds tool results back with the matching tool call id", async () => {
    const llm = new ScriptedLlm((turn) => (turn === 1 ? callTools([tickerCall], "checking") : answer("- hold")));
    const { analyzer, getTicker } = createAnalyzer(llm);

    const result = await analyzer.analyze({ sessionId: "s1", analysisType: "trend" });

    expect(getTicker).toHaveBeenCalledWith({ instId: "BTC-USDT-SWAP" });
    expect(result.summary).toBe("- hold");
    const followUp = llm.requests[1].messages;
    expect(followUp.slice(-2)).toEqual([
      { role: "assistant", content: "checking", toolCalls: [tickerCall] },
      { role: "tool", name: "get_ticker", toolCallId: "call-1", content: '{"instId":"BTC-USDT-SWAP","last":"100"}' },
    ]);
  });

  it("answers every tool call of a turn in order before dispatching again", async () => {
    const second: ToolCallRequest = { id: "call-2", name: "get_ticker", arguments: '{"instId":"ETH-USDT-SWAP"}' };
    const llm = new ScriptedLlm((turn) => (turn === 1 ? callTools([tickerCall, second]) : answer("done")));
    const { analyzer } = createAnalyzer(llm);

    await analyzer.analyze({ sessionId: "s1", analysisType: "trend" });

    const tail = llm.requests[1].messages.slice(-3);
    expect(tail.map((message: ChatMessage) => [message.role, message.toolCallId])).toEqual([
      ["assistant", undefined],
      ["tool", "call-1"],
      ["tool", "call-2"],
    ]);
  });

  it("stops at the iteration cap when the model keeps calling tools", async () => {
    const llm = new ScriptedLlm(() => callTools([tickerCall]));
    const { analyzer, getTicker, conversations } = createAnalyzer(llm);

    const result = await analyzer.analyze({ sessionId: "s1", analysisType: "trend" });

    expect(llm.requests).toHaveLength(3);
    expect(getTicker).toHaveBeenCalledTimes(3);
    expect(result.summary).toBe(FALLBACK_SUMMARY);
    expect(result.suggestions).toEqual([]);
    expect(await conversations.getHistory("s1", 5)).toEqual([{ role: "assistant", content: FALLBACK_SUMMARY }]);
  });

  it("keeps the latest assistant text when the cap is reached", async () => {
    const llm = new ScriptedLlm((turn) => callTools([tickerCall], turn === 2 ? "partial view" : ""));
    const { analyzer } = createAnalyzer(llm);

    const result = await analyzer.analyze({ sessionId: "s1", analysisType: "trend" });

    expect(result.summary).toBe("partial view");
  });

  it("aborts on malformed tool arguments without persisting anything", async () => {
    const llm = new ScriptedLlm(() =>
      callTools([{ id: "call-bad", name: "get_ticker", arguments: "{not-json]" }]),
    );
    const events = new RecordingPublisher();
    const { analyzer, conversations, getTicker } = createAnalyzer(llm, { events });

    await expect(analyzer.analyze({ sessionId: "s1", analysisType: "trend" })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(llm.requests).toHaveLength(1);
    expect(getTicker).not.toHaveBeenCalled();
    expect(await conversations.getHistory("s1", 5)).toEqual([]);
    expect(events.published).toEqual([]);
  });

  it("propagates LLM failures without retrying", async () => {
    const llm = new ScriptedLlm(() => {
      throw new ExternalServiceError("LLM request failed: timeout");
    });
    const { analyzer, conversations } = createAnalyzer(llm);

    await expect(analyzer.analyze({ sessionId: "s1", analysisType: "trend" })).rejects.toThrow(
      "LLM request failed: timeout",
    );
    expect(llm.requests).toHaveLength(1);
    expect(conversations.hasSession("s1")).toBe(false);
  });

  it("publishes an order update for placed orders before the analysis result", async () => {
    const llm = new ScriptedLlm((turn) => (turn === 1 ? callTools([orderCall]) : answer("- bought 1 contract")));
    const events = new RecordingPublisher();
    const { analyzer } = createAnalyzer(llm, { events });

    await analyzer.analyze({ sessionId: "s1", analysisType: "execution", requestId: "req-9" });

    expect(events.published.map((event) => event.type)).toEqual(["order_update", "analysis_result"]);
    expect(events.published[0]).toEqual({
      type: "order_update",
      ordId: "ord-1",
      symbol: "BTC-USDT-SWAP",
      side: "buy",
      order_type: "limit",
      price: "100",
      size: "1",
      filled_size: null,
      status: "submitted",
      metadata: {
        clOrdId: "c-1",
        sCode: "0",
        sMsg: null,
        tool_call_id: "call-order",
        session_id: "s1",
      },
    });
  });

  it("skips the order event when the result carries no order id", async () => {
    const llm = new ScriptedLlm((turn) => (turn === 1 ? callTools([orderCall]) : answer("done")));
    const events = new RecordingPublisher();
    const { analyzer } = createAnalyzer(llm, { events, orderAck: { code: "0", data: [] } });

    await analyzer.analyze({ sessionId: "s1", analysisType: "execution" });

    expect(events.published.map((event) => event.type)).toEqual(["analysis_result"]);
  });

  it("still answers when publishing fails", async () => {
    const llm = new ScriptedLlm(() => answer("- wait"));
    const events: EventPublisher = {
      publish: vi.fn(async () => {
        throw new Error("no subscribers reachable");
      }),
    };
    const { analyzer } = createAnalyzer(llm, { events });

    await expect(analyzer.analyze({ sessionId: "s1", analysisType: "trend" })).resolves.toMatchObject({
      summary: "- wait",
    });
    expect(events.publish).toHaveBeenCalledTimes(1);
  });
});

describe("StrategyAnalyzer.chat", () => {
  it("persists the user message and reply and sums usage", async () => {
    const llm = new ScriptedLlm((turn) =>
      turn === 1
        ? { content: "", toolCalls: [tickerCall], usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12 } }
        : answer("BTC is at 100", { promptTokens: 20, completionTokens: 5, totalTokens: 25 }),
    );
    const { analyzer, conversations } = createAnalyzer(llm);

    const result = await analyzer.chat({ sessionId: "c1", message: "price?", systemPrompt: "be brief" });

    expect(result).toEqual({
      session_id: "c1",
      reply: "BTC is at 100",
      usage: { prompt_tokens: 30, completion_tokens: 7, total_tokens: 37 },
      tool_calls: [{ id: "call-1", name: "get_ticker" }],
      created_at: "2024-05-01T08:00:00.000Z",
    });
    expect(llm.requests[0].messages).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "price?" },
    ]);
    expect(await conversations.getHistory("c1", 10)).toEqual([
      { role: "user", content: "price?" },
      { role: "assistant", content: "BTC is at 100" },
    ]);
  });

  it("includes history only when requested", async () => {
    const llm = new ScriptedLlm(() => answer("ok"));
    const { analyzer, conversations } = createAnalyzer(llm);
    await conversations.addMessage("c1", { role: "user", content: "old" });
    await conversations.addMessage("c1", { role: "assistant", content: "older reply" });

    await analyzer.chat({ sessionId: "c1", message: "new", historyLimit: 1 });
    await analyzer.chat({ sessionId: "c1", message: "fresh", useHistory: false });

    expect(llm.requests[0].messages).toEqual([
      { role: "assistant", content: "older reply" },
      { role: "user", content: "new" },
    ]);
    expect(llm.requests[1].messages).toEqual([{ role: "user", content: "fresh" }]);
  });

  it("reports null usage when the model gives none", async () => {
    const llm = new ScriptedLlm(() => answer(""));
    const { analyzer } = createAnalyzer(llm);

    const result = await analyzer.chat({ sessionId: "c1", message: "hi" });

    expect(result.reply).toBe("No response generated.");
    expect(result.usage).toEqual({ prompt_tokens: null, completion_tokens: null, total_tokens: null });
  });
});

describe("extractSuggestions", () => {
  it("keeps list-like lines and strips dashes and spaces", () => {
    const summary = ["Overview", "  - first -  ", "1. one", "10. ten", "3) third", "4. four", "-", "", "-- twice"].join(
      "\n",
    );
    expect(extractSuggestions(summary)).toEqual(["first", "1. one", "10. ten", "3) third", "twice"]);
  });
});

describe("order acknowledgement parsing", () => {
  it("finds ids at the top level or in the first data entry", () => {
    expect(extractOrderAck({ orderId: "a" })?.ordId).toBe("a");
    expect(extractOrderAck({ order_id: 42 })?.ordId).toBe("42");
    expect(extractOrderAck({ data: [{ ordId: "b", sCode: "0" }] })).toEqual({
      ordId: "b",
      ack: { ordId: "b", sCode: "0" },
    });
    expect(extractOrderAck({ data: [] })).toBeNull();
    expect(extractOrderAck("text")).toBeNull();
  });

  it("falls back to the requested client order id", () => {
    const event = buildOrderUpdateEvent(
      { id: "t1", name: "place_order", arguments: '{"instId":"ETH-USDT-SWAP","side":"sell","sz":"3","clOrdId":"mine"}' },
      { data: [{ ordId: "x", sCode: "0", sMsg: "ok" }] },
      "s2",
    );
    expect(event?.metadata).toEqual({ clOrdId: "mine", sCode: "0", sMsg: "ok", tool_call_id: "t1", session_id: "s2" });
    expect(event?.price).toBeNull();
    expect(event?.order_type).toBeNull();
  });
});
