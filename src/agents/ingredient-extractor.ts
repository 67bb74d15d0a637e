import { INGREDIENT_EXTRACTOR_PROMPT } from "../constants";
import { EmptyExtractionFailure, EmptyResponseFailure } from "../errors";
import type { TextCompleter } from "../services/llm.service";
import { createTurnContext, TurnContext } from "../utils/logger";

/**
 * Splits a comma-separated model answer into ingredient names, keeping
 * the model's order.
 */
export function parseIngredientList(raw: string): string[] {
  return raw
    .split(/[,\n]/)
    .map((entry) =>
      entry
        .trim()
        .replace(/^(?:[-*•]|\d+[.)])\s*/, "")
        .replace(/^["'`]+|["'`.]+$/g, "")
        .replace(/^(?:and|or)\s+/i, "")
        .trim()
    )
    .filter((entry) => entry.length > 0);
}

export class IngredientExtractor {
  constructor(private readonly llm: TextCompleter) {}

  async extract(
    text: string,
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<string[]> {
    const log = ctx.logger.child("IngredientExtractor");

    let raw: string;
    try {
      raw = await this.llm.complete(INGREDIENT_EXTRACTOR_PROMPT, [
        { role: "user", content: text },
      ]);
    } catch (error) {
      if (error instanceof EmptyResponseFailure) {
        throw new EmptyExtractionFailure(undefined, error);
      }
      throw error;
    }

    const ingredients = parseIngredientList(raw);
    if (ingredients.length === 0) {
      throw new EmptyExtractionFailure(`No ingredients in model output: "${raw}"`);
    }

    log.info(`Extracted ${ingredients.length} ingredients`, { ingredients });
    return ingredients;
  }
}
