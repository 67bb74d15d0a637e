import { INTENT_DETECTOR_PROMPT } from "../constants";
import { ClassificationFailure } from "../errors";
import type { TextCompleter } from "../services/llm.service";
import type { Intent } from "../types";
import { createTurnContext, describeError, TurnContext } from "../utils/logger";

const INTENTS: readonly Intent[] = ["ingredients", "recipe_search", "other"];

export function normalizeIntentLabel(raw: string): Intent {
  const label = raw
    .trim()
    .replace(/^["'`\s]+|["'`.\s]+$/g, "")
    .toLowerCase();
  return INTENTS.find((intent) => intent === label) ?? "other";
}

export class IntentDetector {
  constructor(private readonly llm: TextCompleter) {}

  async classify(
    text: string,
    ctx: TurnContext = createTurnContext("detached")
  ): Promise<Intent> {
    const log = ctx.logger.child("IntentDetector");

    if (text.trim() === "") {
      log.debug("Blank message, skipping classification");
      return "other";
    }

    let raw: string;
    try {
      raw = await this.llm.complete(INTENT_DETECTOR_PROMPT, [
        { role: "user", content: text },
      ]);
    } catch (error) {
      throw new ClassificationFailure(
        `Could not classify message: ${describeError(error)}`,
        error
      );
    }

    const intent = normalizeIntentLabel(raw);
    log.info("Intent detected", { intent, raw });
    return intent;
  }
}
