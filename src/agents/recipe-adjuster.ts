import type { Ingredient, Recipe } from "../types";

const key = (name: string) => name.trim().toLowerCase();

/**
 * Re-checks the source's `missedIngredients` against what the user said
 * they have. Matching is case-insensitive; order follows the recipe.
 */
export function resolveMissing(recipe: Recipe, available: string[]): Ingredient[] {
  const have = new Set(available.map(key));
  return recipe.missedIngredients.filter((ingredient) => !have.has(key(ingredient.name)));
}
