/**
 * tools — Barrel exports
 */
export { TOOL_BINDINGS, findTool, type ToolBinding, type ToolArgs } from "./bindings.js";
export { TOOL_PROMPTS, renderPrompt, type ToolPrompt } from "./prompts.js";
export {
  callTool,
  createToolServer,
  startToolServer,
  TOOL_SERVER_NAME,
  TOOL_SERVER_VERSION,
  type ToolArguments,
} from "./server.js";
