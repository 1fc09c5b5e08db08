export type { RedisClient, RedisClientLogger } from "./client.js"
export { createRedisClient } from "./client.js"
export type { MemoryResultCacheOptions, ResultCache, ResultCacheCommands } from "./result-cache.js"
export { MemoryResultCache, RESULT_KEY_PREFIX, RedisResultCache, resultKey } from "./result-cache.js"
