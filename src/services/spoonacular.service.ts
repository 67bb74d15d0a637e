import axios, { AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import type { RankingMode, RecipeSearchConfig } from "../config";
import { UpstreamServiceFailure } from "../errors";
import { Recipe, RecipeDetail, RecipeDetailSchema, RecipeSchema } from "../types";
import { toServiceError } from "./http-errors";

export interface RecipeSource {
  findByIngredients(
    ingredients: string[],
    count: number,
    rankingMode: RankingMode
  ): Promise<Recipe[]>;
  /** `null` when the source has no recipe with that id. */
  getRecipeDetail(id: number): Promise<RecipeDetail | null>;
}

const SERVICE = "Spoonacular";

export class SpoonacularService implements RecipeSource {
  private http: AxiosInstance;

  constructor(
    private readonly config: Pick<RecipeSearchConfig, "apiKey" | "baseUrl" | "timeoutMs">,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
      });
  }

  async findByIngredients(
    ingredients: string[],
    count: number,
    rankingMode: RankingMode
  ): Promise<Recipe[]> {
    let payload: unknown;
    let status: number;
    try {
      const response = await this.http.get("/recipes/findByIngredients", {
        params: {
          ingredients: ingredients.join(","),
          number: count,
          ranking: rankingMode,
          apiKey: this.config.apiKey,
        },
        timeout: this.config.timeoutMs,
      });
      payload = response.data;
      status = response.status;
    } catch (error) {
      throw toServiceError(SERVICE, error, this.config.timeoutMs);
    }

    const parsed = z.array(RecipeSchema).safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamServiceFailure(
        SERVICE,
        `unexpected findByIngredients payload: ${parsed.error.issues[0]?.message}`,
        status
      );
    }
    return parsed.data;
  }

  async getRecipeDetail(id: number): Promise<RecipeDetail | null> {
    let payload: unknown;
    let status: number;
    try {
      const response = await this.http.get(`/recipes/${id}/information`, {
        params: { apiKey: this.config.apiKey },
        timeout: this.config.timeoutMs,
      });
      payload = response.data;
      status = response.status;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw toServiceError(SERVICE, error, this.config.timeoutMs);
    }

    const parsed = RecipeDetailSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamServiceFailure(
        SERVICE,
        `unexpected recipe information payload for ${id}: ${parsed.error.issues[0]?.message}`,
        status
      );
    }
    return parsed.data;
  }
}
