import { z } from "zod";
import { RECIPE_FORMATTER_PROMPT } from "../constants";
import { RecipeFormatFailure } from "../errors";
import type { TextCompleter } from "../services/llm.service";
import type { RecipeSource } from "../services/spoonacular.service";
import type { Recipe } from "../types";
import { createTurnContext, describeError, TurnContext } from "../utils/logger";
import { instructionSteps } from "./recipe-summarizer";

const textOrNumber = z.union([z.string(), z.number()]).transform(String);

export const FormattedRecipeSchema = z
  .object({
    title: z.string().min(1),
    ingredients: z.array(z.string()).min(1),
    instructions: z.array(z.string()),
    cooking_time: textOrNumber,
    difficulty: z.enum(["easy", "medium", "hard"]),
    servings: textOrNumber,
  })
  .strict();
export type FormattedRecipe = z.infer<typeof FormattedRecipeSchema>;

/**
 * Pulls the JSON object out of a model reply (fenced block or the
 * outermost braces) and validates it. Malformed output is rejected.
 */
export function parseFormattedRecipe(reply: string): FormattedRecipe {
  let jsonStr = reply.trim();

  const fenced = jsonStr.match(/```(?:json)?\s*(\{[\s\S]*\})\s*```/);
  if (fenced) {
    jsonStr = fenced[1];
  } else {
    const start = jsonStr.indexOf("{");
    const end = jsonStr.lastIndexOf("}");
    if (start === -1 || end <= start) {
      throw new RecipeFormatFailure("Formatter reply contains no JSON object");
    }
    jsonStr = jsonStr.substring(start, end + 1);
  }

  let candidate: unknown;
  try {
    candidate = JSON.parse(jsonStr);
  } catch (error) {
    throw new RecipeFormatFailure(`Formatter reply is not valid JSON: ${describeError(error)}`, error);
  }

  const parsed = FormattedRecipeSchema.safeParse(candidate);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new RecipeFormatFailure(`Formatter reply failed validation: ${details}`);
  }
  return parsed.data;
}

export class RecipeFormatter {
  constructor(
    private readonly llm: TextCompleter,
    private readonly source: RecipeSource
  ) {}

  async format(
    recipe: Recipe,
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<FormattedRecipe> {
    const log = ctx.logger.child("RecipeFormatter", { recipeId: recipe.id });
    const detail = await this.source.getRecipeDetail(recipe.id);

    const input = {
      title: recipe.title,
      ingredients: [...recipe.usedIngredients, ...recipe.missedIngredients].map(
        (ing) => ing.original ?? `${ing.amount} ${ing.unit} ${ing.name}`.replace(/\s+/g, " ").trim()
      ),
      steps: instructionSteps(detail),
      readyInMinutes: detail?.readyInMinutes ?? null,
      servings: detail?.servings ?? null,
    };

    const reply = await this.llm.complete(RECIPE_FORMATTER_PROMPT, [
      { role: "user", content: JSON.stringify(input, null, 2) },
    ]);

    const formatted = parseFormattedRecipe(reply);
    log.info(`Formatted "${formatted.title}"`, { steps: formatted.instructions.length });
    return formatted;
  }
}
