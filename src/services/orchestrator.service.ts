import { aggregateCosts } from "../agents/cost-calculator";
import { GeneralAssistant } from "../agents/general-assistant";
import { IngredientExtractor } from "../agents/ingredient-extractor";
import { IntentDetector } from "../agents/intent-detector";
import { PriceFetcher } from "../agents/price-fetcher";
import { resolveMissing } from "../agents/recipe-adjuster";
import { RecipeFinder } from "../agents/recipe-finder";
import { FormattedRecipe, RecipeFormatter } from "../agents/recipe-formatter";
import { RecipeSummarizer } from "../agents/recipe-summarizer";
import type { AppConfig } from "../config";
import { NoActiveRecipeError } from "../errors";
import type { ChatbotResponse, ConversationState } from "../types";
import {
  createTurnContext,
  describeError,
  Logger,
  TurnContext,
} from "../utils/logger";
import { KrogerService, GroceryClient } from "./kroger.service";
import { LlmService, TextCompleter } from "./llm.service";
import { RecipeSource, SpoonacularService } from "./spoonacular.service";

export type WorkflowStage =
  | "Idle"
  | "ClassifyingIntent"
  | "ExtractingIngredients"
  | "FindingRecipe"
  | "ResolvingMissing"
  | "FetchingPrices"
  | "Aggregating"
  | "Summarizing"
  | "GeneralConversation";

export interface OrchestratorAgents {
  intentDetector: IntentDetector;
  ingredientExtractor: IngredientExtractor;
  recipeFinder: RecipeFinder;
  priceFetcher: PriceFetcher;
  recipeSummarizer: RecipeSummarizer;
  generalAssistant: GeneralAssistant;
  recipeFormatter: RecipeFormatter;
}

const emptyState = (): ConversationState => ({
  availableIngredients: [],
  currentRecipe: null,
  currentMissingIngredients: [],
});

/**
 * Runs one chat session's turns. Ingredient messages go through
 * extract -> find -> resolve -> price -> aggregate -> summarize;
 * everything else goes to the general assistant.
 */
export class OrchestratorService {
  private state: ConversationState = emptyState();
  private stage: WorkflowStage = "Idle";

  constructor(
    readonly sessionId: string,
    private readonly agents: OrchestratorAgents
  ) {}

  get currentStage(): WorkflowStage {
    return this.stage;
  }

  getState(): ConversationState {
    return {
      availableIngredients: [...this.state.availableIngredients],
      currentRecipe: this.state.currentRecipe,
      currentMissingIngredients: [...this.state.currentMissingIngredients],
    };
  }

  reset() {
    this.state = emptyState();
  }

  async processMessage(userText: string): Promise<ChatbotResponse> {
    const ctx = createTurnContext(this.sessionId);
    const log = ctx.logger.child("Orchestrator");

    try {
      this.enter("ClassifyingIntent", log);
      const intent = await this.agents.intentDetector.classify(userText, ctx);

      if (intent === "ingredients" || intent === "recipe_search") {
        return await this.runIngredientPath(userText, ctx, log);
      }

      this.enter("GeneralConversation", log);
      const message = await this.agents.generalAssistant.reply(userText, ctx);
      return { message, data: {} };
    } catch (error) {
      log.error("Turn aborted", { stage: this.stage, error: describeError(error) });
      throw error;
    } finally {
      this.stage = "Idle";
    }
  }

  async formatCurrentRecipe(): Promise<FormattedRecipe> {
    const recipe = this.state.currentRecipe;
    if (!recipe) {
      throw new NoActiveRecipeError(this.sessionId);
    }
    return this.agents.recipeFormatter.format(recipe, createTurnContext(this.sessionId));
  }

  private async runIngredientPath(
    userText: string,
    ctx: TurnContext,
    log: Logger
  ): Promise<ChatbotResponse> {
    this.enter("ExtractingIngredients", log);
    const ingredients = await this.agents.ingredientExtractor.extract(userText, ctx);

    this.enter("FindingRecipe", log);
    const recipe = await this.agents.recipeFinder.findRecipe(ingredients, ctx);

    this.enter("ResolvingMissing", log);
    const missing = resolveMissing(recipe, ingredients);

    this.enter("FetchingPrices", log);
    const priced = await this.agents.priceFetcher.fetchPrices(missing, ctx);

    this.enter("Aggregating", log);
    const { totalCost, itemCosts } = aggregateCosts(priced);

    this.enter("Summarizing", log);
    const summary = await this.agents.recipeSummarizer.summarize(
      recipe,
      missing,
      totalCost,
      itemCosts,
      ctx
    );

    // Only a completed turn replaces the session state
    this.state = {
      availableIngredients: ingredients,
      currentRecipe: recipe,
      currentMissingIngredients: missing,
    };

    log.info("Turn complete", {
      recipeId: recipe.id,
      missing: missing.length,
      totalCost,
    });

    return {
      message: summary,
      data: {
        recipe,
        missing_ingredients: missing,
        total_cost: totalCost,
        ingredient_costs: itemCosts,
      },
    };
  }

  private enter(stage: WorkflowStage, log: Logger) {
    log.debug(`${this.stage} -> ${stage}`);
    this.stage = stage;
  }
}

export interface SharedCollaborators {
  llm: TextCompleter;
  recipes: RecipeSource;
  grocery: GroceryClient;
}

export function createSharedCollaborators(config: AppConfig): SharedCollaborators {
  return {
    llm: new LlmService(config.llm),
    recipes: new SpoonacularService(config.recipes),
    grocery: new KrogerService(config.grocery),
  };
}

/**
 * Wires one session's pipeline. The price fetcher (and so its token
 * cache) is per session; the collaborators may be shared.
 */
export function createOrchestrator(
  sessionId: string,
  config: AppConfig,
  shared: SharedCollaborators
): OrchestratorService {
  const { llm, recipes, grocery } = shared;

  return new OrchestratorService(sessionId, {
    intentDetector: new IntentDetector(llm),
    ingredientExtractor: new IngredientExtractor(llm),
    recipeFinder: new RecipeFinder(recipes, {
      candidateCount: config.recipes.candidateCount,
      rankingMode: config.recipes.rankingMode,
      retryAttempts: config.recipes.retryAttempts,
      retryBaseDelayMs: config.recipes.retryBaseDelayMs,
    }),
    priceFetcher: new PriceFetcher(grocery, {
      locationId: config.grocery.locationId,
      productLimit: config.grocery.productLimit,
    }),
    recipeSummarizer: new RecipeSummarizer(llm, recipes, {
      narrate: config.summaryNarration,
    }),
    generalAssistant: new GeneralAssistant(llm),
    recipeFormatter: new RecipeFormatter(llm, recipes),
  });
}
