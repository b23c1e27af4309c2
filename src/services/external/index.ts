// External API clients
export { ArkhamClient, arkhamClient, toHolderRecord } from './ArkhamClient.js';
export type { ArkhamClientOptions, ArkhamHolder } from './ArkhamClient.js';
export { PancakeSwapClient, pancakeSwapClient } from './PancakeSwapClient.js';
export type { PancakeSwapClientOptions, PoolProtocol } from './PancakeSwapClient.js';
export { CoinGeckoClient, coinGeckoClient } from './CoinGeckoClient.js';
export type { CoinGeckoClientOptions } from './CoinGeckoClient.js';
export { HttpError } from './http.js';
