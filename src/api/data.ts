import { Router, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { isAnalysisError } from '../utils/errors.js';
import { simulatePriceImpact } from '../services/swap/SwapSimulator.js';
import { priceImpactService, type PriceImpactService } from '../services/swap/PriceImpactService.js';
import { holderAnalysisService, type HolderAnalysisService } from '../services/holders/HolderAnalysisService.js';
import { coinGeckoClient } from '../services/external/CoinGeckoClient.js';
import type { AssetPlatform, TokenMarketData } from '../types/pool.js';

export interface MarketDataSource {
  getTokenData(tokenAddress: string, platform: string): Promise<TokenMarketData | null>;
  getAssetPlatforms(): Promise<AssetPlatform[]>;
}

export interface DataRouterDeps {
  holders: HolderAnalysisService;
  priceImpact: PriceImpactService;
  marketData: MarketDataSource;
}

const holderRecordSchema = z.object({
  address: z.string(),
  balance: z.number(),
  entityName: z.string().optional(),
  entityLabel: z.string().optional(),
  entityType: z.string().optional(),
  chain: z.string().optional(),
});

const contextSchema = z.object({
  totalSupply: z.number(),
  lockedSupply: z.number(),
  lockedAddresses: z.array(z.string()).default([]),
  marketMakerAddresses: z.array(z.string()).optional(),
  burnAddresses: z.array(z.string()).optional(),
});

const analysisParametersSchema = z.object({
  topNs: z.array(z.number()).optional(),
  whaleThreshold: z.number().optional(),
});

const analyzeBodySchema = analysisParametersSchema.extend({
  records: z.array(holderRecordSchema),
  context: contextSchema,
});

const snapshotBodySchema = analysisParametersSchema.extend({
  chain: z.string().min(1),
  context: contextSchema,
  exportCsv: z.boolean().optional(),
  refresh: z.boolean().optional(),
});

// Token ids name export files, so no separators or parent segments
const tokenParamSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, 'Token may only contain letters, digits, ".", "_" and "-"')
  .refine(token => !token.includes('..'), 'Token may not contain ".."');

const chainQuerySchema = z.object({
  chain: z.string().min(1),
});

const snapshotHistoryQuerySchema = z.object({
  chain: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

const simulateBodySchema = z.object({
  pool: z.object({
    reserveBase: z.number(),
    reserveQuote: z.number(),
    feeRate: z.number().default(0),
  }),
  amountIn: z.number(),
  direction: z.enum(['baseToQuote', 'quoteToBase']),
  feeRate: z.number().optional(),
});

const priceImpactQuerySchema = z.object({
  tokenIn: z.string().min(1),
  amountIn: z.coerce.number(),
  fee: z.coerce.number().optional(),
  protocol: z.enum(['v2', 'v3', 'stable']).optional(),
});

/**
 * Engine validation errors → 400 with their code, anything else → 500
 */
function sendError(res: Response, error: unknown, action: string): void {
  if (isAnalysisError(error)) {
    res.status(400).json({ error: error.code, message: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'InvalidRequest',
      message: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
    });
    return;
  }

  logger.error(`Failed to ${action}`, { error: (error as Error).message });
  res.status(500).json({ error: 'Internal server error' });
}

export function createDataRouter(deps: DataRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/holders/analyze
   * Analyze holder rows supplied by the caller
   */
  router.post('/holders/analyze', (req: Request, res: Response) => {
    try {
      const { records, context, topNs, whaleThreshold } = analyzeBodySchema.parse(req.body);
      const analysis = deps.holders.analyzeRecords(records, context, { topNs, whaleThreshold });
      res.json(analysis);
    } catch (error) {
      sendError(res, error, 'analyze holders');
    }
  });

  /**
   * POST /api/holders/:token/snapshots
   * Fetch labeled holders for a chain, analyze and store a snapshot
   */
  router.post('/holders/:token/snapshots', async (req: Request, res: Response) => {
    try {
      const token = tokenParamSchema.parse(req.params.token);
      const body = snapshotBodySchema.parse(req.body);
      const snapshot = await deps.holders.createSnapshot({ token, ...body });

      if (!snapshot) {
        res.status(404).json({ error: 'Token not found' });
        return;
      }

      res.status(201).json(snapshot);
    } catch (error) {
      sendError(res, error, 'create holder snapshot');
    }
  });

  /**
   * GET /api/holders/:token/snapshots/latest?chain=
   * Most recent stored snapshot
   */
  router.get('/holders/:token/snapshots/latest', async (req: Request, res: Response) => {
    try {
      const token = tokenParamSchema.parse(req.params.token);
      const { chain } = chainQuerySchema.parse(req.query);
      const snapshot = await deps.holders.getLatestSnapshot(token, chain);

      if (!snapshot) {
        res.status(404).json({ error: 'No snapshot found' });
        return;
      }

      res.json(snapshot);
    } catch (error) {
      sendError(res, error, 'get latest holder snapshot');
    }
  });

  /**
   * GET /api/holders/:token/snapshots?chain=&limit=
   * Stored snapshots, newest first
   */
  router.get('/holders/:token/snapshots', async (req: Request, res: Response) => {
    try {
      const token = tokenParamSchema.parse(req.params.token);
      const { chain, limit } = snapshotHistoryQuerySchema.parse(req.query);
      const snapshots = await deps.holders.getSnapshotHistory(token, chain, limit);
      res.json({ snapshots, count: snapshots.length });
    } catch (error) {
      sendError(res, error, 'get holder snapshots');
    }
  });

  /**
   * POST /api/swap/simulate
   * Exact-input swap against caller-supplied reserves
   */
  router.post('/swap/simulate', (req: Request, res: Response) => {
    try {
      const { pool, amountIn, direction, feeRate } = simulateBodySchema.parse(req.body);
      res.json(simulatePriceImpact(pool, amountIn, direction, feeRate));
    } catch (error) {
      sendError(res, error, 'simulate swap');
    }
  });

  /**
   * GET /api/pools/:chain/:pool/price-impact?tokenIn=&amountIn=&fee=&protocol=
   * Price impact against live pool reserves
   */
  router.get('/pools/:chain/:pool/price-impact', async (req: Request, res: Response) => {
    try {
      const { tokenIn, amountIn, fee, protocol } = priceImpactQuerySchema.parse(req.query);
      const outcome = await deps.priceImpact.calculatePriceImpact(
        req.params.chain,
        req.params.pool,
        tokenIn,
        amountIn,
        fee,
        protocol
      );

      if (!outcome) {
        res.status(404).json({ error: 'Pool not found' });
        return;
      }

      res.json(outcome);
    } catch (error) {
      sendError(res, error, 'calculate price impact');
    }
  });

  /**
   * GET /api/tokens/:platform/:address
   * Token price, market cap and derived supply
   */
  router.get('/tokens/:platform/:address', async (req: Request, res: Response) => {
    try {
      const token = await deps.marketData.getTokenData(req.params.address, req.params.platform);

      if (!token) {
        res.status(404).json({ error: 'Token not found' });
        return;
      }

      res.json(token);
    } catch (error) {
      sendError(res, error, 'get token data');
    }
  });

  /**
   * GET /api/chains
   * Platforms accepted by the token endpoint
   */
  router.get('/chains', async (_req: Request, res: Response) => {
    try {
      const chains = await deps.marketData.getAssetPlatforms();
      res.json({ chains, count: chains.length });
    } catch (error) {
      sendError(res, error, 'get chains');
    }
  });

  return router;
}

export const dataRouter = createDataRouter({
  holders: holderAnalysisService,
  priceImpact: priceImpactService,
  marketData: coinGeckoClient,
});
