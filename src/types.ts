import type { Dispatcher } from "undici";

/** Decoded JSON as handed back to callers, with enum fields already mapped. */
export type ApiValue = string | number | boolean | null | ApiValue[] | { [key: string]: ApiValue };

export type ApiObject = { [key: string]: ApiValue };

export type Payload = Record<string, string | number>;

export interface RawResponse {
  status: number;
  body: string;
}

export interface FetchInit {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  dispatcher?: Dispatcher;
}

export interface FetchResponse {
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface SymbolInfo {
  symbol: string;
  priceDecimals: number;
  qtyDecimals: number;
  minTotal: number;
}

export const DEFAULT_BASE_URL = "https://3.98.238.66/api";
