import type { RankingMode } from "../config";
import { NoRecipesFoundFailure } from "../errors";
import { isTransientFailure } from "../services/http-errors";
import type { RecipeSource } from "../services/spoonacular.service";
import type { Recipe } from "../types";
import { createTurnContext, describeError, TurnContext } from "../utils/logger";
import { RetryOptions, withRetry } from "../utils/retry";

export const SCORE_WEIGHTS = {
  usage: 0.4,
  coverage: 0.3,
  title: 0.3,
} as const;

export interface RecipeScore {
  usageScore: number;
  coverageRatio: number;
  titleBonus: number;
  score: number;
}

export interface ScoredRecipe extends RecipeScore {
  recipe: Recipe;
}

export interface RecipeFinderOptions {
  candidateCount: number;
  rankingMode: RankingMode;
  retryAttempts: number;
  retryBaseDelayMs: number;
  sleep?: RetryOptions["sleep"];
}

/**
 * Weighted fit of one candidate against the user's ingredients.
 * Name matching is lowercase substring containment, not equality.
 */
export function scoreRecipe(recipe: Recipe, ingredients: string[]): RecipeScore {
  const wanted = ingredients.map((name) => name.toLowerCase());

  const usedMatches = recipe.usedIngredients.filter((used) => {
    const name = used.name.toLowerCase();
    return wanted.some((w) => name.includes(w));
  }).length;
  const usageScore = wanted.length > 0 ? usedMatches / wanted.length : 0;

  const used = recipe.usedIngredients.length;
  const missed = recipe.missedIngredients.length;
  const coverageRatio = used + missed > 0 ? used / (used + missed) : 0;

  const title = recipe.title.toLowerCase();
  const titleBonus = wanted.some((w) => title.includes(w)) ? 1 : 0;

  const score =
    SCORE_WEIGHTS.usage * usageScore +
    SCORE_WEIGHTS.coverage * coverageRatio +
    SCORE_WEIGHTS.title * titleBonus;

  return { usageScore, coverageRatio, titleBonus, score };
}

/** Best first. Equal scores keep the source's order. */
export function rankRecipes(recipes: Recipe[], ingredients: string[]): ScoredRecipe[] {
  return recipes
    .map((recipe) => ({ recipe, ...scoreRecipe(recipe, ingredients) }))
    .sort((a, b) => b.score - a.score);
}

export class RecipeFinder {
  constructor(
    private readonly source: RecipeSource,
    private readonly options: RecipeFinderOptions
  ) {}

  async findCandidates(
    ingredients: string[],
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<ScoredRecipe[]> {
    const log = ctx.logger.child("RecipeFinder");
    const { candidateCount, rankingMode } = this.options;

    const candidates = await withRetry(
      () => this.source.findByIngredients(ingredients, candidateCount, rankingMode),
      {
        attempts: this.options.retryAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        shouldRetry: isTransientFailure,
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) =>
          log.warn(`Recipe lookup attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: describeError(error),
          }),
      }
    );

    if (candidates.length === 0) {
      throw new NoRecipesFoundFailure(ingredients);
    }

    const ranked = rankRecipes(candidates, ingredients);
    log.debug("Ranked candidates", {
      ranking: ranked.map((r) => ({ id: r.recipe.id, title: r.recipe.title, score: r.score })),
    });
    return ranked;
  }

  async findRecipe(
    ingredients: string[],
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<Recipe> {
    const [best] = await this.findCandidates(ingredients, ctx);
    ctx.logger.child("RecipeFinder").info(`Selected "${best.recipe.title}"`, {
      recipeId: best.recipe.id,
      score: best.score,
    });
    return best.recipe;
  }
}
