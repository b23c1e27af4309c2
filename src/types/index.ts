// Holder types
export * from './holder.js';

// Pool types
export * from './pool.js';

// Cache TTL configuration (seconds)
export const CACHE_TTL = {
  HOLDERS: 300,        // 5 minutes
  POOL_INFO: 30,       // 30 seconds
  TOKEN_PRICE: 60,     // 1 minute
  ASSET_PLATFORMS: 86_400, // 1 day
} as const;

export const DEFAULT_WHALE_THRESHOLD = 0.05;
