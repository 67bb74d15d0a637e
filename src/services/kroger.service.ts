import axios, { AxiosInstance, isAxiosError } from "axios";
import type { GroceryConfig } from "../config";
import { AuthenticationFailure, UpstreamServiceFailure } from "../errors";
import { KrogerTokenResponseSchema, PriceQuote, PriceQuoteSchema } from "../types";
import { toServiceError } from "./http-errors";

export interface GroceryToken {
  accessToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export interface GroceryClient {
  authenticate(): Promise<GroceryToken>;
  searchProduct(
    term: string,
    accessToken: string,
    locationId: string,
    limit: number
  ): Promise<PriceQuote>;
}

const SERVICE = "Kroger";

export class KrogerService implements GroceryClient {
  private http: AxiosInstance;

  constructor(
    private readonly config: Pick<
      GroceryConfig,
      "clientId" | "clientSecret" | "baseUrl" | "timeoutMs"
    >,
    http?: AxiosInstance,
    private readonly now: () => number = Date.now
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
      });
  }

  /** Client-credentials grant, `product.compact` scope. */
  async authenticate(): Promise<GroceryToken> {
    const basic = Buffer.from(
      `${this.config.clientId}:${this.config.clientSecret}`
    ).toString("base64");

    let payload: unknown;
    try {
      const response = await this.http.post(
        "/connect/oauth2/token",
        "grant_type=client_credentials&scope=product.compact",
        {
          headers: {
            Authorization: `Basic ${basic}`,
            "Content-Type": "application/x-www-form-urlencoded",
          },
          timeout: this.config.timeoutMs,
        }
      );
      payload = response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        throw new AuthenticationFailure(
          `Kroger auth failed (${error.response.status})`,
          error
        );
      }
      throw toServiceError(SERVICE, error, this.config.timeoutMs);
    }

    const parsed = KrogerTokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationFailure("Kroger auth returned no usable token");
    }

    return {
      accessToken: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
  }

  async searchProduct(
    term: string,
    accessToken: string,
    locationId: string,
    limit: number
  ): Promise<PriceQuote> {
    let payload: unknown;
    let status: number;
    try {
      const response = await this.http.get("/products", {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${accessToken}`,
        },
        params: {
          "filter.term": term,
          "filter.limit": limit,
          "filter.locationId": locationId,
        },
        timeout: this.config.timeoutMs,
      });
      payload = response.data;
      status = response.status;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 401) {
        throw new AuthenticationFailure("Kroger rejected the access token", error);
      }
      throw toServiceError(SERVICE, error, this.config.timeoutMs);
    }

    const parsed = PriceQuoteSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamServiceFailure(
        SERVICE,
        `unexpected product search payload for "${term}": ${parsed.error.issues[0]?.message}`,
        status
      );
    }
    return parsed.data;
  }
}
