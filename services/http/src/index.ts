/**
 * http — Barrel exports
 */
export {
  buildHttpServer,
  startHttpServer,
  clientIdOf,
  secretsMatch,
  renderRouteIndex,
  type HttpServerOptions,
} from "./server.js";
