#!/usr/bin/env node
/**
 * nepse-gateway CLI entry point.
 */
import "dotenv/config";
import { Command } from "commander";
import { registerServeCli } from "./serve.js";
import { registerToolsCli } from "./tools.js";
import { registerUpdateStocksCli } from "./update-stocks.js";

const program = new Command();

program
  .name("nepse-gateway")
  .description("Rate-limited NEPSE market data gateway over HTTP, WebSocket, ZeroMQ and agent tools")
  .version("1.0.0");

registerServeCli(program);
registerToolsCli(program);
registerUpdateStocksCli(program);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
