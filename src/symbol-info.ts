import { z } from "zod";
import { VirgoCXCacheMissError, VirgoCXDecodeError } from "./errors.js";
import logger from "./logger.js";
import type { SymbolInfo } from "./types.js";

const tickerEntrySchema = z.object({
  symbol: z.string().min(1),
  priceDecimals: z.coerce.number().int().nonnegative(),
  qtyDecimals: z.coerce.number().int().nonnegative(),
  minTotal: z.coerce.number().nonnegative(),
});

/**
 * Per-symbol precision limits, read from the ticker listing.
 *
 * Loaded at most once: concurrent callers of ensureLoaded share the in-flight
 * load, and a failed load is forgotten so the next caller starts a new one.
 */
export class SymbolInfoCache {
  private cache = new Map<string, SymbolInfo>();
  private loading: Promise<void> | null = null;
  private loaded = false;

  async ensureLoaded(fetchTickers: () => Promise<unknown>): Promise<void> {
    if (this.loaded) return;
    if (!this.loading) {
      this.loading = this.load(fetchTickers).finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(fetchTickers: () => Promise<unknown>): Promise<void> {
    const data = await fetchTickers();
    if (!Array.isArray(data)) {
      throw new VirgoCXDecodeError("Ticker listing is not an array");
    }

    const next = new Map<string, SymbolInfo>();
    for (const raw of data) {
      const entry = tickerEntrySchema.safeParse(raw);
      if (!entry.success) {
        logger.debug("Skipping ticker entry without formatting info", { entry: raw });
        continue;
      }
      next.set(entry.data.symbol, entry.data);
    }

    this.cache = next;
    this.loaded = true;
    logger.info(`Loaded formatting info for ${next.size} symbols`);
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  get(symbol: string): SymbolInfo | undefined {
    return this.cache.get(symbol);
  }

  require(symbol: string): SymbolInfo {
    const info = this.cache.get(symbol);
    if (!info) throw new VirgoCXCacheMissError(symbol);
    return info;
  }

  clear(): void {
    this.cache.clear();
    this.loaded = false;
  }
}

/** Shared by every client in the process unless one is given its own. */
export const sharedSymbolCache = new SymbolInfoCache();
