/**
 * Tool Binding
 *
 * Exposes the route table as agent tools over the Model Context Protocol.
 * Each call is admitted under the configured tool client id and the route
 * name, then answered with the route's JSON as text content. The canned
 * prompts in prompts.ts are served beside the tools.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult, GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toErrorBody } from "../../shared/src/errors.js";
import { createLogger, setLogStream } from "../../shared/src/logger.js";
import type { Gateway } from "../../gateway/src/gateway.js";
import { TOOL_BINDINGS, type ToolBinding } from "./bindings.js";
import { TOOL_PROMPTS, renderPrompt, type ToolPrompt } from "./prompts.js";

const log = createLogger("tools");

export const TOOL_SERVER_NAME = "nepse-data-gateway";
export const TOOL_SERVER_VERSION = "1.0.0";

export interface ToolArguments {
  symbol?: string;
  company_name?: string;
}

function routeParams(binding: ToolBinding, args: ToolArguments): Record<string, unknown> {
  switch (binding.args) {
    case "none":
      return {};
    case "symbol":
      return { symbol: args.symbol };
    case "company":
      return { query: args.company_name };
  }
}

export async function callTool(
  gateway: Gateway,
  clientId: string,
  binding: ToolBinding,
  args: ToolArguments = {},
): Promise<CallToolResult> {
  const outcome = await gateway.handle({
    clientId,
    route: binding.route,
    params: routeParams(binding, args),
  });

  if (outcome.status === "ok") {
    return { content: [{ type: "text", text: JSON.stringify(outcome.data, null, 2) }] };
  }

  log.debug("Tool call refused", { tool: binding.name, status: outcome.status });
  return {
    content: [{ type: "text", text: JSON.stringify(toErrorBody(outcome.error), null, 2) }],
    isError: true,
  };
}

function promptResult(prompt: ToolPrompt, args: Readonly<Record<string, string>>): GetPromptResult {
  return {
    description: prompt.description,
    messages: [{ role: "user", content: { type: "text", text: renderPrompt(prompt, args) } }],
  };
}

function registerPrompt(server: McpServer, prompt: ToolPrompt): void {
  if (prompt.args.length === 0) {
    server.prompt(prompt.name, prompt.description, () => promptResult(prompt, {}));
    return;
  }
  const shape: Record<string, z.ZodString> = {};
  for (const arg of prompt.args) shape[arg] = z.string();
  server.prompt(prompt.name, prompt.description, shape, (args) => promptResult(prompt, args));
}

export function createToolServer(gateway: Gateway, clientId: string): McpServer {
  const server = new McpServer({ name: TOOL_SERVER_NAME, version: TOOL_SERVER_VERSION });

  for (const binding of TOOL_BINDINGS) {
    switch (binding.args) {
      case "none":
        server.tool(binding.name, binding.description, async () => callTool(gateway, clientId, binding));
        break;
      case "symbol":
        server.tool(
          binding.name,
          binding.description,
          { symbol: z.string().describe("Stock symbol, e.g. NABIL") },
          async ({ symbol }) => callTool(gateway, clientId, binding, { symbol }),
        );
        break;
      case "company":
        server.tool(
          binding.name,
          binding.description,
          { company_name: z.string().describe("Company name or a word from it, e.g. Nabil") },
          async ({ company_name }) => callTool(gateway, clientId, binding, { company_name }),
        );
        break;
    }
  }

  for (const prompt of TOOL_PROMPTS) registerPrompt(server, prompt);

  return server;
}

/** Serve tools on stdin/stdout. All logging moves to stderr first. */
export async function startToolServer(gateway: Gateway, clientId: string): Promise<McpServer> {
  setLogStream("stderr");
  const server = createToolServer(gateway, clientId);
  await server.connect(new StdioServerTransport());
  log.info("Tool server ready on stdio", { tools: TOOL_BINDINGS.length, prompts: TOOL_PROMPTS.length });
  return server;
}
