import axios, { type AxiosInstance } from 'axios';
import { config } from '../config/index.js';
import { exchangeLeverage } from '../copier/orders.js';
import { RateLimiter, type Sleep } from '../copier/throttle.js';
import type { AssetSizing, OrderRequest, TradingGateway } from '../copier/types.js';
import { hyperliquidClient, type HyperliquidClient } from './hyperliquid.js';

// Spot asset ids follow perps after this offset
export const SPOT_ASSET_OFFSET = 10000;
const PERP_PRICE_DECIMALS = 6;
const SPOT_PRICE_DECIMALS = 8;
const MAX_ATTEMPTS = 3;

export interface OrderWire {
  a: number;
  b: boolean;
  p: string;
  s: string;
  r: boolean;
  t: { limit: { tif: 'Ioc' } };
}

export type ExchangeAction =
  | { type: 'order'; orders: OrderWire[]; grouping: 'na' }
  | { type: 'updateLeverage'; asset: number; isCross: boolean; leverage: number };

export interface ExchangeSignature {
  r: string;
  s: string;
  v: number;
}

// Signing is venue-specific and injected
export interface ActionSigner {
  sign(action: ExchangeAction, nonce: number): Promise<ExchangeSignature>;
}

interface AssetMeta {
  assetId: number;
  szDecimals: number;
}

interface ExchangeResponse {
  status?: string;
  response?: unknown;
}

export interface TradingClientOptions {
  baseUrl?: string;
  info?: HyperliquidClient;
  signer?: ActionSigner | null;
  limiter?: RateLimiter;
  sleep?: Sleep;
}

/**
 * Hyperliquid trading client: asset metadata, order wire format and
 * signed exchange actions
 */
export class HyperliquidTradingClient implements TradingGateway {
  private http: AxiosInstance;
  private info: HyperliquidClient;
  private signer: ActionSigner | null;
  private limiter: RateLimiter;
  private sleep: Sleep;
  private assets: Map<string, AssetMeta> | null = null;

  constructor(options: TradingClientOptions = {}) {
    this.http = axios.create({
      baseURL: (options.baseUrl || config.hyperliquid.apiUrl).replace(/\/info\/?$/, ''),
      timeout: 10000,
      headers: { 'Content-Type': 'application/json' },
    });
    this.info = options.info ?? hyperliquidClient;
    this.signer = options.signer ?? null;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.limiter = options.limiter ?? new RateLimiter(config.hyperliquid.maxRps, this.sleep);
  }

  hasSigner(): boolean {
    return this.signer !== null;
  }

  /**
   * Load perp + spot universes once
   */
  async loadMeta(force = false): Promise<Map<string, AssetMeta>> {
    if (this.assets && !force) return this.assets;

    const [meta, spotMeta] = await Promise.all([this.info.getMeta(), this.info.getSpotMeta()]);
    const assets = new Map<string, AssetMeta>();

    (meta.universe ?? []).forEach((entry, index) => {
      if (!entry.name || entry.szDecimals === null || entry.szDecimals === undefined) return;
      assets.set(entry.name.toUpperCase(), { assetId: index, szDecimals: entry.szDecimals });
    });

    const tokens = spotMeta.tokens ?? [];
    for (const spot of spotMeta.universe ?? []) {
      const tokenIndex = spot.tokens?.[0];
      if (!spot.name || spot.index === null || spot.index === undefined || tokenIndex === undefined) continue;
      const szDecimals = tokens[tokenIndex]?.szDecimals;
      if (szDecimals === null || szDecimals === undefined) continue;
      assets.set(spot.name.toUpperCase(), { assetId: spot.index + SPOT_ASSET_OFFSET, szDecimals });
    }

    this.assets = assets;
    return assets;
  }

  private async assetMeta(asset: string): Promise<AssetMeta> {
    const meta = (await this.loadMeta()).get(asset.toUpperCase());
    if (!meta) throw new Error(`Unknown asset ${asset}`);
    return meta;
  }

  async resolveAssetSizing(asset: string): Promise<AssetSizing> {
    const { assetId, szDecimals } = await this.assetMeta(asset);
    const priceDecimals = (assetId < SPOT_ASSET_OFFSET ? PERP_PRICE_DECIMALS : SPOT_PRICE_DECIMALS) - szDecimals;
    return {
      minSizeIncrement: 10 ** -szDecimals,
      priceIncrement: 10 ** -Math.max(priceDecimals, 0),
    };
  }

  async submitOrder(order: OrderRequest): Promise<unknown> {
    const { assetId } = await this.assetMeta(order.asset);
    const wire: OrderWire = {
      a: assetId,
      b: order.isBuy,
      p: String(order.limitPrice),
      s: String(order.size),
      r: order.reduceOnly,
      t: { limit: { tif: order.timeInForce } },
    };
    return this.postExchange({ type: 'order', orders: [wire], grouping: 'na' });
  }

  async updateLeverage(asset: string, leverage: number, isCross: boolean): Promise<unknown> {
    const { assetId } = await this.assetMeta(asset);
    return this.postExchange({
      type: 'updateLeverage',
      asset: assetId,
      isCross,
      leverage: exchangeLeverage(leverage),
    });
  }

  /**
   * Sign and POST /exchange. 429 honours Retry-After; 5xx and network
   * errors back off min(2^attempt, 5)s.
   */
  private async postExchange(action: ExchangeAction): Promise<unknown> {
    if (!this.signer) throw new Error('Trading signer not configured');

    const nonce = Date.now();
    const signature = await this.signer.sign(action, nonce);
    const body = { action, nonce, signature, vaultAddress: null };

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      await this.limiter.acquire();
      try {
        const response = await this.http.post<ExchangeResponse>('/exchange', body);
        if (response.data.status === 'err') {
          throw new Error(`exchange rejected ${action.type}: ${JSON.stringify(response.data.response)}`);
        }
        return response.data.response ?? response.data;
      } catch (error) {
        lastError = error;
        if (!axios.isAxiosError(error)) throw error;

        const status = error.response?.status;
        if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
          throw new Error(`${error.message} body=${JSON.stringify(error.response?.data)}`);
        }
        if (attempt === MAX_ATTEMPTS) break;

        const retryAfter = status === 429 ? Number(error.response?.headers['retry-after']) : 0;
        const delaySec = retryAfter > 0 ? retryAfter : Math.min(2 ** attempt, 5);
        console.warn(`Exchange ${action.type} failed (${status ?? error.code}), retrying in ${delaySec}s...`);
        await this.sleep(delaySec * 1000);
      }
    }

    throw lastError;
  }
}
