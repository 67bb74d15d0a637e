import { CHEF_PERSONA_PROMPT } from "../constants";
import type { TextCompleter } from "../services/llm.service";
import { createTurnContext, TurnContext } from "../utils/logger";

export class GeneralAssistant {
  constructor(private readonly llm: TextCompleter) {}

  async reply(text: string, ctx: TurnContext = createTurnContext("detached")): Promise<string> {
    ctx.logger.child("GeneralAssistant").debug("Answering general message");
    return this.llm.complete(CHEF_PERSONA_PROMPT, [{ role: "user", content: text }]);
  }
}
