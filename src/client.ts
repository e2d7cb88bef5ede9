import { z } from "zod";
import {
  OrderDirection,
  OrderType,
  parseKLineType,
  parseOrderDirection,
  parseOrderStatus,
  parseOrderType,
  type KLineType,
  type OrderStatus,
  type ParseResult,
} from "./enums.js";
import { VirgoCXDecodeError, VirgoCXUsageError } from "./errors.js";
import logger from "./logger.js";
import { clampDecimals } from "./precision.js";
import { resultFormatter } from "./result-formatter.js";
import { vcxSign } from "./signer.js";
import { sharedSymbolCache, SymbolInfoCache } from "./symbol-info.js";
import { HttpTransport } from "./transport.js";
import { DEFAULT_BASE_URL, type ApiObject, type ApiValue, type FetchFn, type Payload } from "./types.js";

export interface VirgoCXClientConfig {
  apiKey?: string;
  apiSecret?: string;
  baseUrl?: string;
  /** Verify the server certificate. Off by default: the API is served from a bare IP. */
  verifyTls?: boolean;
  fetch?: FetchFn;
  symbolCache?: SymbolInfoCache;
}

export interface PlaceOrderParams {
  symbol: string;
  category: OrderType;
  direction: OrderDirection;
  price?: number;
  /** Quantity in the crypto asset */
  qty?: number;
  /** Order value in the fiat currency */
  total?: number;
  /**
   * Derive a missing field instead of failing: qty from total / price on limit
   * orders, total from qty and the discounted market price on non-limit buys.
   * The latter costs an extra getDiscount request.
   */
  convert?: boolean;
}

const marketPriceSchema = z.coerce.number().positive();

function requireEnum<T>(parse: (raw: unknown) => ParseResult<T>, raw: unknown, field: string): T {
  const result = parse(raw);
  if (!result.ok) throw new VirgoCXUsageError(result.reason, field);
  return result.value;
}

function isApiObject(value: ApiValue | undefined): value is ApiObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class VirgoCXClient {
  // Credentials live in true private fields: not enumerable, not serialized
  readonly #apiKey: string | undefined;
  readonly #sign: (payload: Payload) => string;

  private readonly transport: HttpTransport;
  private readonly symbolCache: SymbolInfoCache;
  private readonly get: (path: string, params?: Payload) => Promise<ApiValue>;
  private readonly getAtypical: (path: string, params?: Payload) => Promise<ApiValue>;
  private readonly post: (path: string, params: Payload) => Promise<ApiValue>;

  constructor(config: VirgoCXClientConfig = {}) {
    const { apiSecret } = config;
    this.#apiKey = config.apiKey;
    this.#sign = (payload) => vcxSign(payload, apiSecret);

    this.transport = new HttpTransport({
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      verifyTls: config.verifyTls ?? false,
      fetch: config.fetch,
    });
    this.symbolCache = config.symbolCache ?? sharedSymbolCache;

    const get = (path: string, params?: Payload) => this.transport.get(path, params);
    this.get = resultFormatter("typical")(get);
    this.getAtypical = resultFormatter("atypical")(get);
    this.post = resultFormatter("typical")((path: string, params: Payload) => this.transport.post(path, params));
  }

  /** Builds a client and makes sure the symbol formatting info is loaded. */
  static async create(config?: VirgoCXClientConfig): Promise<VirgoCXClient> {
    const client = new VirgoCXClient(config);
    await client.init();
    return client;
  }

  async init(): Promise<void> {
    await this.symbolCache.ensureLoaded(() => this.tickers());
  }

  private signed(params: Payload): Payload {
    if (!this.#apiKey) throw new VirgoCXUsageError("API key is required", "apiKey");
    const payload: Payload = { apiKey: this.#apiKey, ...params };
    payload.sign = this.#sign(payload);
    return payload;
  }

  // ── Market data ────────────────────────────────────────────────────────────

  async kline(symbol: string, period: KLineType): Promise<ApiValue> {
    const p = requireEnum(parseKLineType, period, "period");
    return this.get("/market/history/kline", { symbol, period: p });
  }

  async ticker(symbol: string): Promise<ApiValue> {
    return this.get("/market/detail/merged", { symbol });
  }

  async tickers(): Promise<ApiValue> {
    return this.get("/market/tickers");
  }

  // ── Account ────────────────────────────────────────────────────────────────

  async accountInfo(): Promise<ApiValue> {
    return this.get("/member/accounts", this.signed({}));
  }

  async queryOrders(symbol: string, status?: OrderStatus): Promise<ApiValue> {
    const params: Payload = { symbol };
    if (status !== undefined) params.status = requireEnum(parseOrderStatus, status, "status");
    return this.get("/member/queryOrder", this.signed(params));
  }

  /** Completed trades. This endpoint reports `category` as the order type and `type` as the side. */
  async queryTrades(symbol: string): Promise<ApiValue> {
    return this.getAtypical("/member/queryTrade", this.signed({ symbol }));
  }

  /** Discounted prices, one entry per symbol (all symbols when none is given). */
  async getDiscount(symbol?: string): Promise<ApiValue[]> {
    const params: Payload = {};
    if (symbol !== undefined) params.symbol = symbol;
    const data = await this.get("/member/discountPrice", this.signed(params));
    if (data === null) return [];
    return Array.isArray(data) ? data : [data];
  }

  // ── Trading ────────────────────────────────────────────────────────────────

  /**
   * Places an order.
   *
   * Limit orders need `price` and `qty`; non-limit buys need `total`; non-limit
   * sells need `qty` (see `convert` for deriving the missing one). Values with
   * more decimals than the symbol allows are rounded down with a warning; a
   * `total` under the symbol's minimum is rejected.
   */
  async placeOrder(params: PlaceOrderParams): Promise<ApiValue> {
    const { symbol, convert = false } = params;
    const category = requireEnum(parseOrderType, params.category, "category");
    const direction = requireEnum(parseOrderDirection, params.direction, "direction");
    let { price, qty, total } = params;

    for (const [field, value] of [["price", price], ["qty", qty], ["total", total]] as const) {
      if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
        throw new VirgoCXUsageError(`${field} must be a positive number`, field);
      }
    }

    let marketQty: number | undefined;
    if (category === OrderType.LIMIT) {
      if (price === undefined) throw new VirgoCXUsageError("Price is required for limit orders", "price");
      if (qty === undefined) {
        if (!convert || total === undefined) {
          throw new VirgoCXUsageError("Quantity is required for limit orders", "qty");
        }
        qty = total / price;
        total = undefined;
      }
    } else if (direction === OrderDirection.BUY) {
      if (total === undefined) {
        if (!convert || qty === undefined) {
          throw new VirgoCXUsageError("Total is required for non-limit buy orders", "total");
        }
        marketQty = qty;
        qty = undefined;
      }
    } else if (qty === undefined) {
      throw new VirgoCXUsageError("Quantity is required for non-limit sell orders", "qty");
    }

    await this.init();
    const info = this.symbolCache.require(symbol);

    if (marketQty !== undefined) {
      total = marketQty * (await this.marketPrice(symbol));
    }

    const payload: Payload = { symbol, category, type: direction, country: 1 };
    if (price !== undefined) payload.price = this.fitDecimals(symbol, "price", price, info.priceDecimals);
    if (qty !== undefined) payload.qty = this.fitDecimals(symbol, "qty", qty, info.qtyDecimals);
    if (total !== undefined) {
      const fitted = this.fitDecimals(symbol, "total", total, info.priceDecimals);
      if (fitted < info.minTotal) {
        throw new VirgoCXUsageError(`Total ${fitted} is below the minimum of ${info.minTotal} for ${symbol}`, "total");
      }
      payload.total = fitted;
    }

    return this.post("/member/addOrder", this.signed(payload));
  }

  async cancelOrder(orderId: string | number): Promise<ApiValue> {
    return this.post("/member/cancelOrder", this.signed({ id: orderId }));
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private fitDecimals(symbol: string, field: string, value: number, decimals: number): number {
    const result = clampDecimals(value, decimals);
    if (result.clamped) {
      logger.warn(`${field} ${value} has more than ${decimals} decimals for ${symbol}; rounded down to ${result.value}`);
    }
    if (result.value <= 0) {
      throw new VirgoCXUsageError(`${field} ${value} rounds down to zero for ${symbol}`, field);
    }
    return result.value;
  }

  // Only non-limit buys derive a total, so this is always the ask side
  private async marketPrice(symbol: string): Promise<number> {
    logger.info(`Fetching discounted market price for ${symbol} to derive order total`);
    const entries = await this.getDiscount(symbol);
    const entry = entries.find((e) => isApiObject(e) && e.symbol === symbol) ?? entries[0];
    const price = marketPriceSchema.safeParse(isApiObject(entry) ? entry.askPrice : undefined);
    if (!price.success) {
      throw new VirgoCXDecodeError(`No askPrice in discount price for ${symbol}`, "askPrice");
    }
    return price.data;
  }
}
