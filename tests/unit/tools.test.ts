/**
 * Tests for the agent tool binding, over an in-memory transport.
 */
import { describe, it, expect, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { TOOL_BINDINGS, findTool, type ToolBinding } from "../../services/tools/src/bindings.js";
import { callTool, createToolServer } from "../../services/tools/src/server.js";
import { TOOL_PROMPTS, renderPrompt } from "../../services/tools/src/prompts.js";
import { isRouteName } from "../../services/gateway/src/routes.js";
import { CLOSED, testGateway } from "./gateway-fixtures.js";

const CLIENT = "tool-client";

function tool(name: string): ToolBinding {
  const binding = findTool(name);
  if (!binding) throw new Error(`no tool named ${name}`);
  return binding;
}

function textOf(result: { content: unknown[] }): unknown {
  const [first] = result.content;
  if (typeof first !== "object" || first === null || !("text" in first) || typeof first.text !== "string") {
    throw new Error("expected text content");
  }
  return JSON.parse(first.text);
}

describe("tool bindings", () => {
  it("should map every tool onto a known route", () => {
    expect(TOOL_BINDINGS).toHaveLength(21);
    expect(new Set(TOOL_BINDINGS.map((t) => t.name)).size).toBe(21);
    for (const binding of TOOL_BINDINGS) {
      expect(isRouteName(binding.route)).toBe(true);
    }
  });

  it("should find tools by name", () => {
    expect(findTool("get_top_gainers")?.route).toBe("TopGainers");
    expect(findTool("get_weather")).toBeUndefined();
  });
});

describe("callTool", () => {
  it("should answer with the route data as JSON text", async () => {
    const { gateway } = testGateway({ "/CompanyDetails?symbol=NABIL": { symbol: "NABIL", ltp: 500 } });

    const result = await callTool(gateway, CLIENT, tool("get_company_details"), { symbol: "nabil" });

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([{ type: "text", text: JSON.stringify({ symbol: "NABIL", ltp: 500 }, null, 2) }]);
  });

  it("should pass the company name as the search query", async () => {
    const { gateway } = testGateway();

    const result = await callTool(gateway, CLIENT, tool("find_symbol_by_company_name"), { company_name: "Nabil" });

    expect(textOf(result)).toMatchObject({ found: true, query: "Nabil", matches: [{ symbol: "NABIL" }] });
  });

  it("should flag refusals as errors", async () => {
    const { gateway } = testGateway({ "/IsNepseOpen": CLOSED });

    const result = await callTool(gateway, CLIENT, tool("get_market_depth"), { symbol: "NABIL" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toEqual({
      route: "MarketDepth",
      required: "open",
      actual: "closed",
      error: "market_state",
      message: "Market is closed. MarketDepth only works when the market is open.",
    });
  });

  it("should count calls against the tool client's budget", async () => {
    const { gateway } = testGateway({}, { limits: { validation: 1 } });

    await callTool(gateway, CLIENT, tool("get_validation_stats"));
    const result = await callTool(gateway, CLIENT, tool("get_validation_stats"));

    expect(result.isError).toBe(true);
    expect(textOf(result)).toMatchObject({ error: "rate_limit_exceeded", category: "validation" });
  });
});

describe("tool server", () => {
  const clients: Client[] = [];

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((c) => c.close()));
  });

  async function connect(payloads: Record<string, unknown> = {}): Promise<Client> {
    const { gateway } = testGateway(payloads);
    const server = createToolServer(gateway, CLIENT);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
    clients.push(client);
    return client;
  }

  it("should list every tool", async () => {
    const client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual(TOOL_BINDINGS.map((t) => t.name).sort());
    const details = tools.find((t) => t.name === "get_company_details");
    expect(details?.inputSchema.required).toEqual(["symbol"]);
  });

  it("should call a tool end to end", async () => {
    const client = await connect({ "/TopGainers": [{ symbol: "UPPER", pointChange: 12 }] });

    const result = await client.callTool({ name: "get_top_gainers", arguments: {} });

    expect(result).toMatchObject({
      content: [{ type: "text", text: JSON.stringify([{ symbol: "UPPER", pointChange: 12 }], null, 2) }],
    });
  });

  it("should list every prompt with its arguments", async () => {
    const client = await connect();

    const { prompts } = await client.listPrompts();

    expect(prompts.map((p) => p.name).sort()).toEqual([
      "company-deep-dive",
      "live-market-watchlist",
      "market-depth-analyzer",
      "market-open-status",
      "market-sentiment-snapshot",
      "post-market-trade-explorer",
      "sector-performance",
      "setup-alert",
      "stock-quick-lookup",
      "validate-stock-symbol",
    ]);
    const alert = prompts.find((p) => p.name === "setup-alert");
    expect(alert?.arguments?.map((a) => a.name)).toEqual(["symbol", "type", "threshold"]);
    const status = prompts.find((p) => p.name === "market-open-status");
    expect(status?.arguments).toBeUndefined();
  });

  it("should render a prompt as a single user message", async () => {
    const client = await connect();

    const result = await client.getPrompt({
      name: "setup-alert",
      arguments: { symbol: "NABIL", type: "price", threshold: "1200" },
    });

    expect(result.messages).toEqual([
      { role: "user", content: { type: "text", text: "Set up an alert for NABIL when price crosses 1200." } },
    ]);
  });

  it("should render a prompt without arguments", async () => {
    const client = await connect();

    const result = await client.getPrompt({ name: "market-open-status" });

    expect(result.messages).toEqual([
      { role: "user", content: { type: "text", text: "Is the NEPSE market currently open or closed?" } },
    ]);
  });
});

describe("renderPrompt", () => {
  const lookup = TOOL_PROMPTS.find((p) => p.name === "stock-quick-lookup");

  it("should fill placeholders from the arguments", () => {
    expect(lookup && renderPrompt(lookup, { symbol: "UPPER" })).toBe("Show me a quick summary for UPPER.");
  });

  it("should leave a placeholder without an argument as written", () => {
    expect(lookup && renderPrompt(lookup, {})).toBe("Show me a quick summary for {symbol}.");
  });
});
