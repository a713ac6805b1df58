import { globalFetch, type FetchLike } from "../../http/fetch.js";

export interface PaystackInitializePayload {
  email: string;
  amount: number;
  currency: string;
  reference: string;
  callback_url: string;
  metadata: {
    internal_id: string;
    reference: string;
    app_name: string;
    purpose: string;
  };
}

export interface PaystackHttpResponse {
  statusCode: number;
  body: string;
}

interface PaystackClientOptions {
  baseUrl: string;
  secretKey: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

/**
 * Thin transport over the Paystack REST API. Transport failures (DNS, reset,
 * timeout) are thrown; HTTP error statuses are returned for the gateway to map.
 */
export class PaystackClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: PaystackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? globalFetch;
  }

  async initializeTransaction(payload: PaystackInitializePayload): Promise<PaystackHttpResponse> {
    return this.post("/transaction/initialize", payload);
  }

  private async post(path: string, payload: unknown): Promise<PaystackHttpResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.secretKey}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    return {
      statusCode: response.status,
      body: await response.text(),
    };
  }
}
