import { RECIPE_SUMMARY_PROMPT } from "../constants";
import type { TextCompleter } from "../services/llm.service";
import type { RecipeSource } from "../services/spoonacular.service";
import type { Ingredient, Recipe, RecipeDetail } from "../types";
import { createTurnContext, describeError, TurnContext } from "../utils/logger";

export interface RecipeFacts {
  recipe: Recipe;
  detail: RecipeDetail | null;
  missingIngredients: Ingredient[];
  totalCost: number;
  itemCosts: Record<string, number>;
}

const usd = (amount: number) => `$${amount.toFixed(2)}`;

export function instructionSteps(detail: RecipeDetail | null): string[] {
  if (!detail) return [];

  const analyzed = detail.analyzedInstructions.flatMap((block) =>
    block.steps.map((s) => s.step.trim())
  );
  if (analyzed.length > 0) return analyzed.filter(Boolean);

  // Plain `instructions` is often HTML (<ol><li>...</li></ol>)
  return (detail.instructions ?? "")
    .replace(/<[^>]+>/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Deterministic plain-text summary. Used as the fact sheet handed to the
 * model and, unchanged, as the reply when narration is off or fails.
 */
export function buildTemplateSummary(facts: RecipeFacts): string {
  const { recipe, detail, missingIngredients, totalCost, itemCosts } = facts;
  const lines = [`Recipe: ${recipe.title}`];

  if (detail?.readyInMinutes) lines.push(`Ready in ${detail.readyInMinutes} minutes`);
  if (detail?.servings) lines.push(`Serves ${detail.servings}`);
  lines.push("");

  if (missingIngredients.length === 0) {
    lines.push("You already have everything you need.");
  } else {
    lines.push("Missing ingredients:");
    // itemCosts is keyed by name, so a repeated ingredient gets one line
    const names = [...new Set(missingIngredients.map((ing) => ing.name))];
    for (const name of names) {
      const cost = itemCosts[name];
      lines.push(cost === undefined ? `- ${name}: price unavailable` : `- ${name}: ${usd(cost)}`);
    }
    lines.push(`Total cost for missing ingredients: ${usd(totalCost)}`);
  }

  const steps = instructionSteps(detail);
  if (steps.length > 0) {
    lines.push("", "Steps:", ...steps.map((step, i) => `${i + 1}. ${step}`));
  }

  if (detail?.sourceUrl) lines.push("", `Source: ${detail.sourceUrl}`);

  return lines.join("\n");
}

export interface RecipeSummarizerOptions {
  /** When false the template summary is returned without a model call. */
  narrate: boolean;
}

export class RecipeSummarizer {
  constructor(
    private readonly llm: TextCompleter,
    private readonly source: RecipeSource,
    private readonly options: RecipeSummarizerOptions
  ) {}

  /** Never rejects: any failure degrades to the template summary. */
  async summarize(
    recipe: Recipe,
    missingIngredients: Ingredient[],
    totalCost: number,
    itemCosts: Record<string, number>,
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<string> {
    const log = ctx.logger.child("RecipeSummarizer", { recipeId: recipe.id });

    let detail: RecipeDetail | null = null;
    try {
      detail = await this.source.getRecipeDetail(recipe.id);
    } catch (error) {
      log.warn("Recipe detail unavailable, summarising without it", {
        error: describeError(error),
      });
    }

    const template = buildTemplateSummary({
      recipe,
      detail,
      missingIngredients,
      totalCost,
      itemCosts,
    });

    if (!this.options.narrate) return template;

    try {
      return await this.llm.complete(RECIPE_SUMMARY_PROMPT, [
        { role: "user", content: `Recipe facts:\n\n${template}` },
      ]);
    } catch (error) {
      log.warn("Narration failed, using template summary", {
        error: describeError(error),
      });
      return template;
    }
  }
}
