// Integer-coded enums used by the VirgoCX API.

export const KLineType = {
  MINUTE: 1,
  FIVE_MINUTE: 5,
  TEN_MINUTE: 10,
  THIRTY_MINUTE: 30,
  HOUR: 60,
  FOUR_HOUR: 240,
  DAY: 1440,
  FIVE_DAY: 7200,
  WEEK: 10080,
  MONTH: 43200,
} as const;
export type KLineType = (typeof KLineType)[keyof typeof KLineType];

export const OrderStatus = {
  CANCELED: -1,
  PLACED: 0,
  OPEN: 1,
  MATCHING: 2,
  COMPLETED: 3,
} as const;
export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const OrderDirection = {
  BUY: 1,
  SELL: 2,
} as const;
export type OrderDirection = (typeof OrderDirection)[keyof typeof OrderDirection];

export const OrderType = {
  LIMIT: 1,
  MARKET: 2,
  QUICK_TRADE: 3,
} as const;
export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type EnumParser = (raw: unknown) => ParseResult<number>;

function intEnumParser<E extends Record<string, number>>(name: string, members: E): (raw: unknown) => ParseResult<E[keyof E]> {
  const values = new Set<number>(Object.values(members));
  const isMember = (n: number): n is E[keyof E] => values.has(n);
  return (raw) => {
    // Codes sometimes arrive as numeric strings
    const n = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
    if (typeof n === "number" && isMember(n)) return { ok: true, value: n };
    return { ok: false, reason: `Invalid ${name}: ${JSON.stringify(raw)}` };
  };
}

export const parseKLineType = intEnumParser("kline type", KLineType);
export const parseOrderStatus = intEnumParser("order status", OrderStatus);
export const parseOrderDirection = intEnumParser("order direction", OrderDirection);
export const parseOrderType = intEnumParser("order type", OrderType);

// Trade history reports the side as "buy"/"sell" rather than its code
export function parseOrderDirectionName(raw: unknown): ParseResult<OrderDirection> {
  if (typeof raw === "string") {
    const name = raw.toLowerCase();
    if (name === "buy") return { ok: true, value: OrderDirection.BUY };
    if (name === "sell") return { ok: true, value: OrderDirection.SELL };
  }
  return { ok: false, reason: `Invalid order direction: ${JSON.stringify(raw)}` };
}

/**
 * Which key→enum mapping a call decodes its payload with.
 *
 * Most endpoints name the side `direction` and the order type `type`; the trade
 * history endpoint instead uses `category` for the order type and `type` for the
 * side (as a string).
 */
export type MappingVariant = "typical" | "atypical";

export const TYPICAL_KEY_TO_ENUM: ReadonlyMap<string, EnumParser> = new Map<string, EnumParser>([
  ["status", parseOrderStatus],
  ["direction", parseOrderDirection],
  ["type", parseOrderType],
]);

export const ATYPICAL_KEY_TO_ENUM: ReadonlyMap<string, EnumParser> = new Map<string, EnumParser>([
  ["status", parseOrderStatus],
  ["category", parseOrderType],
  ["type", parseOrderDirectionName],
]);

export function keyMapping(variant: MappingVariant): ReadonlyMap<string, EnumParser> {
  return variant === "typical" ? TYPICAL_KEY_TO_ENUM : ATYPICAL_KEY_TO_ENUM;
}
