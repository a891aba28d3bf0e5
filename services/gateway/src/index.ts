/**
 * gateway — route table, dispatcher and the shared request core
 */
export {
  ROUTES,
  ROUTE_NAMES,
  isRouteName,
  getRoute,
  paramsOf,
  summaryToRecord,
  keyByIndex,
  type RouteName,
  type RouteDescriptor,
  type RouteContext,
  type ParamSpec,
  type ParamKind,
  type ResolvedParams,
} from "./routes.js";
export { Dispatcher, withQuery, assertNever, type DispatcherConfig, type RawParams } from "./dispatch.js";
export {
  Gateway,
  createGateway,
  logFailure,
  type GatewayRequest,
  type GatewayOutcome,
  type GatewayServices,
  type GatewayOverrides,
} from "./gateway.js";
