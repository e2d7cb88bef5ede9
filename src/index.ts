export { VirgoCXClient } from "./client.js";
export type { VirgoCXClientConfig, PlaceOrderParams } from "./client.js";
export { vcxSign } from "./signer.js";
export { formatResult, outputEnumify, resultFormatter } from "./result-formatter.js";
export { SymbolInfoCache, sharedSymbolCache } from "./symbol-info.js";
export { HttpTransport } from "./transport.js";
export {
  KLineType,
  OrderStatus,
  OrderDirection,
  OrderType,
  TYPICAL_KEY_TO_ENUM,
  ATYPICAL_KEY_TO_ENUM,
  parseKLineType,
  parseOrderStatus,
  parseOrderDirection,
  parseOrderDirectionName,
  parseOrderType,
} from "./enums.js";
export type { MappingVariant, ParseResult } from "./enums.js";
export {
  VirgoCXError,
  VirgoCXUsageError,
  VirgoCXStatusError,
  VirgoCXApiError,
  VirgoCXCacheMissError,
  VirgoCXDecodeError,
} from "./errors.js";
export type { VirgoCXErrorKind } from "./errors.js";
export type { ApiValue, ApiObject, Payload, RawResponse, FetchFn, SymbolInfo } from "./types.js";
