export { RedisCache, createRedisCache, type RedisCacheConfig, type ICache } from './RedisCache';
