/**
 * tools - run the agent tool server on stdio
 *
 * Usage:
 *   nepse-gateway tools
 */
import type { Command } from "commander";
import { loadConfig, setLogStream } from "../../services/shared/src/index.js";
import { createGateway } from "../../services/gateway/src/index.js";
import { startToolServer } from "../../services/tools/src/index.js";

export function registerToolsCli(program: Command) {
  program
    .command("tools")
    .description("Expose market data as agent tools over stdio")
    .action(async () => {
      // stdout belongs to the protocol from here on
      setLogStream("stderr");
      const config = loadConfig();
      const services = createGateway(config);
      await startToolServer(services.gateway, config.TOOL_CLIENT_ID);
    });
}
