/**
 * serve - run the enabled transports against one shared gateway
 *
 * Usage:
 *   nepse-gateway serve
 */
import type { Command } from "commander";
import { createLogger, loadConfig } from "../../services/shared/src/index.js";
import { createGateway } from "../../services/gateway/src/index.js";
import { buildHttpServer, startHttpServer } from "../../services/http/src/index.js";
import { closeWebSocketServer, startWebSocketServer } from "../../services/websocket/src/index.js";
import { ReplyLoop } from "../../services/queue/src/index.js";
import { SnapshotScheduler } from "../../services/snapshot/src/index.js";

const log = createLogger("serve");

type Closer = { name: string; close: () => Promise<unknown> };

export function registerServeCli(program: Command) {
  program
    .command("serve")
    .description("Serve market data over HTTP, WebSocket and the ZeroMQ queue")
    .action(async () => {
      const config = loadConfig();
      const services = createGateway(config);
      const { gateway, validator } = services;
      const exposeInternalErrors = config.NODE_ENV !== "production";
      const closers: Closer[] = [];
      let shuttingDown = false;

      const shutdown = async (reason: string, exitCode: number): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        log.info("Shutting down", { reason });

        for (const closer of closers.reverse()) {
          try {
            await closer.close();
          } catch (err) {
            log.error("Failed to close transport", {
              transport: closer.name,
              error: err instanceof Error ? err.message : String(err),
            });
          }
        }
        services.close();
        process.exit(exitCode);
      };

      const scheduler = new SnapshotScheduler(services.snapshotUpdater, config.SNAPSHOT_REFRESH_HOURS);
      scheduler.start();
      closers.push({ name: "snapshot-scheduler", close: async () => scheduler.stop() });

      if (config.ENABLE_HTTP) {
        const app = await buildHttpServer({
          gateway,
          validator,
          restartSecret: config.RESTART_SECRET,
          exposeInternalErrors,
          // The supervisor restarts the process after a clean exit
          onRestart: () => void shutdown("restart requested", 0),
        });
        await startHttpServer(app, config.HTTP_HOST, config.HTTP_PORT);
        closers.push({ name: "http", close: () => app.close() });
      }

      if (config.ENABLE_WS) {
        const wss = await startWebSocketServer({
          gateway,
          host: config.HTTP_HOST,
          port: config.WS_PORT,
          exposeInternalErrors,
        });
        closers.push({ name: "websocket", close: () => closeWebSocketServer(wss) });
      }

      if (config.ENABLE_ZMQ) {
        const { bindReplySocket } = await import("../../services/queue/src/zmq.js");
        const socket = await bindReplySocket(config.ZMQ_ENDPOINT);
        const loop = new ReplyLoop(gateway, socket, config.ZMQ_CLIENT_ID, exposeInternalErrors);
        void loop.start();
        closers.push({ name: "queue", close: () => loop.stop() });
      }

      if (closers.length === 1) {
        log.warn("No transport enabled; set ENABLE_HTTP, ENABLE_WS or ENABLE_ZMQ");
      }

      process.once("SIGINT", () => void shutdown("SIGINT", 0));
      process.once("SIGTERM", () => void shutdown("SIGTERM", 0));
    });
}
