import { z } from "zod";

/* ---------- Spoonacular ---------- */

export const IngredientSchema = z.object({
  id: z.number(),
  name: z.string(),
  amount: z.number().default(0),
  unit: z.string().default(""),
  original: z.string().optional(),
  aisle: z.string().nullish(),
  image: z.string().nullish(),
});
export type Ingredient = z.infer<typeof IngredientSchema>;

export const RecipeSchema = z.object({
  id: z.number(),
  title: z.string(),
  image: z.string().nullish(),
  usedIngredients: z.array(IngredientSchema).default([]),
  missedIngredients: z.array(IngredientSchema).default([]),
  unusedIngredients: z.array(IngredientSchema).default([]),
  likes: z.number().optional(),
});
export type Recipe = z.infer<typeof RecipeSchema>;

export const RecipeStepSchema = z.object({
  number: z.number(),
  step: z.string(),
});

export const RecipeDetailSchema = z.object({
  id: z.number(),
  title: z.string(),
  summary: z.string().nullish(),
  instructions: z.string().nullish(),
  analyzedInstructions: z
    .array(z.object({ name: z.string().optional(), steps: z.array(RecipeStepSchema) }))
    .default([]),
  readyInMinutes: z.number().nullish(),
  servings: z.number().nullish(),
  sourceUrl: z.string().nullish(),
});
export type RecipeDetail = z.infer<typeof RecipeDetailSchema>;

/* ---------- Kroger ---------- */

export const KrogerItemSchema = z.object({
  itemId: z.string().optional(),
  size: z.string().optional(),
  price: z
    .object({
      regular: z.number().optional(),
      promo: z.number().optional(),
    })
    .optional(),
});

export const KrogerProductSchema = z.object({
  productId: z.string(),
  upc: z.string().optional(),
  brand: z.string().nullish(),
  description: z.string().optional(),
  items: z.array(KrogerItemSchema).default([]),
});
export type KrogerProduct = z.infer<typeof KrogerProductSchema>;

export const PriceQuoteSchema = z.object({
  data: z.array(KrogerProductSchema).default([]),
  meta: z
    .object({
      pagination: z
        .object({ start: z.number(), limit: z.number(), total: z.number() })
        .partial()
        .optional(),
    })
    .optional(),
});
/** Product search result for one ingredient; an empty `data` is a valid quote. */
export type PriceQuote = z.infer<typeof PriceQuoteSchema>;

export const KrogerTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string().optional(),
});

/* ---------- Pipeline ---------- */

export type Intent = "ingredients" | "recipe_search" | "other";

export interface PricedIngredient {
  /** Name as the recipe lists it */
  name: string;
  /** Cleaned term sent to the grocery search */
  searchTerm: string;
  quote: PriceQuote;
}

export interface CostBreakdown {
  totalCost: number;
  itemCosts: Record<string, number>;
}

export interface ConversationState {
  availableIngredients: string[];
  currentRecipe: Recipe | null;
  currentMissingIngredients: Ingredient[];
}

export interface RecipeTurnData {
  recipe: Recipe;
  missing_ingredients: Ingredient[];
  total_cost: number;
  ingredient_costs: Record<string, number>;
}

export interface ChatbotResponse {
  message: string;
  data: RecipeTurnData | Record<string, never>;
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}
