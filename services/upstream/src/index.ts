/**
 * upstream — data-source client and endpoint response cache
 */
export { UpstreamClient, type UpstreamClientConfig, type FetchLike } from "./client.js";
export {
  TTLCache,
  EndpointCache,
  type FetchOptions,
  type JsonFetcher,
  type UpstreamSource,
  type EndpointCacheStats,
} from "./cache.js";
