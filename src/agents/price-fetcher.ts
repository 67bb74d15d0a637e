import { AuthenticationFailure } from "../errors";
import type { GroceryClient, GroceryToken } from "../services/kroger.service";
import type { Ingredient, PricedIngredient, PriceQuote } from "../types";
import { createTurnContext, TurnContext } from "../utils/logger";

// Longest phrases first so "slabs of" goes before the bare "of"
const FILLER_WORDS = ["slabs of", "pieces of", "of", "fresh", "whole"];
const FILLER_PATTERN = new RegExp(
  `\\b(?:${FILLER_WORDS.map((w) => w.replace(/ /g, "\\s+")).join("|")})\\b`,
  "gi"
);

/** Tokens this close to expiry are treated as expired. */
export const TOKEN_EXPIRY_SKEW_MS = 60_000;

/**
 * Turns a recipe ingredient name into a grocery search term:
 * cut at the first `*`, `(` or `,`, drop filler words, squeeze spaces.
 */
export function cleanIngredientName(name: string): string {
  const cut = name.search(/[*(,]/);
  const head = cut === -1 ? name : name.slice(0, cut);
  return head.replace(FILLER_PATTERN, " ").replace(/\s+/g, " ").trim();
}

export interface PriceFetcherOptions {
  locationId: string;
  productLimit: number;
  now?: () => number;
}

export class PriceFetcher {
  private token: GroceryToken | null = null;
  private readonly now: () => number;

  constructor(
    private readonly grocery: GroceryClient,
    private readonly options: PriceFetcherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  private async accessToken(ctx: TurnContext): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt - TOKEN_EXPIRY_SKEW_MS) {
      return this.token.accessToken;
    }
    ctx.logger.child("PriceFetcher").debug("Authenticating with grocery API");
    this.token = await this.grocery.authenticate();
    return this.token.accessToken;
  }

  /**
   * One lookup per ingredient, in order. Authenticates only when the
   * cached token is missing or about to expire.
   */
  async fetchPrices(
    ingredients: Ingredient[],
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<PricedIngredient[]> {
    const log = ctx.logger.child("PriceFetcher");
    const results: PricedIngredient[] = [];

    if (ingredients.length === 0) return results;

    const accessToken = await this.accessToken(ctx);

    for (const ingredient of ingredients) {
      const searchTerm = cleanIngredientName(ingredient.name);
      let quote: PriceQuote = { data: [] };

      if (searchTerm !== "") {
        try {
          quote = await this.grocery.searchProduct(
            searchTerm,
            accessToken,
            this.options.locationId,
            this.options.productLimit
          );
        } catch (error) {
          if (error instanceof AuthenticationFailure) {
            this.token = null;
          }
          throw error;
        }
      }

      log.debug(`Quote for "${searchTerm}"`, { products: quote.data.length });
      results.push({ name: ingredient.name, searchTerm, quote });
    }

    return results;
  }
}
