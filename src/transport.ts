import { Agent, fetch as undiciFetch } from "undici";
import logger from "./logger.js";
import type { FetchFn, FetchInit, Payload, RawResponse } from "./types.js";

export interface TransportConfig {
  baseUrl: string;
  verifyTls: boolean;
  fetch?: FetchFn;
}

/**
 * Plain HTTPS transport: GET with a query string, POST with a form body.
 * Status handling and JSON decoding are left to the result formatter.
 */
export class HttpTransport {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly dispatcher?: Agent;

  constructor(config: TransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.fetchFn = config.fetch ?? undiciFetch;
    if (!config.verifyTls) {
      // The API is reached by IP address, so its certificate does not match the host
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
  }

  private buildQueryParams(params: Payload): string {
    return Object.entries(params)
      .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`)
      .join("&");
  }

  private async send(url: string, init: FetchInit): Promise<RawResponse> {
    if (this.dispatcher) init.dispatcher = this.dispatcher;
    logger.debug(`${init.method} ${url.split("?")[0]}`);
    const response = await this.fetchFn(url, init);
    return { status: response.status, body: await response.text() };
  }

  async get(path: string, params?: Payload): Promise<RawResponse> {
    const qp = params ? this.buildQueryParams(params) : "";
    return this.send(`${this.baseUrl}${path}${qp ? "?" + qp : ""}`, { method: "GET" });
  }

  async post(path: string, params: Payload): Promise<RawResponse> {
    return this.send(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: this.buildQueryParams(params),
    });
  }
}
