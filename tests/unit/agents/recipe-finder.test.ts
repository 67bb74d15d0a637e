import axios from "axios";
import { describe, it, expect, vi } from "vitest";
import {
  rankRecipes,
  RecipeFinder,
  RecipeFinderOptions,
  scoreRecipe,
} from "../../../src/agents/recipe-finder";
import {
  NoRecipesFoundFailure,
  TimeoutFailure,
  UpstreamServiceFailure,
} from "../../../src/errors";
import { SpoonacularService } from "../../../src/services/spoonacular.service";
import { axiosResponse, FakeRecipeSource, recipe } from "../../helpers/fakes";

const delays: number[] = [];
const options: RecipeFinderOptions = {
  candidateCount: 5,
  rankingMode: 1,
  retryAttempts: 3,
  retryBaseDelayMs: 10,
  sleep: async (ms) => {
    delays.push(ms);
  },
};

describe("scoreRecipe", () => {
  it("weights usage, coverage and title", () => {
    const stirFry = recipe(1, "Garlic Chicken Stir Fry", ["chicken breast", "garlic cloves"], [
      "soy sauce",
      "ginger",
    ]);

    const result = scoreRecipe(stirFry, ["Chicken", "garlic", "onions"]);

    expect(result.usageScore).toBeCloseTo(2 / 3, 10);
    expect(result.coverageRatio).toBe(0.5);
    expect(result.titleBonus).toBe(1);
    expect(result.score).toBeCloseTo(0.4 * (2 / 3) + 0.3 * 0.5 + 0.3, 10);
  });

  it("matches when the recipe ingredient contains the user's word", () => {
    const result = scoreRecipe(recipe(1, "Ratatouille", ["eggplant"]), ["egg"]);
    expect(result.usageScore).toBe(1);
  });

  it("does not match when only the user's word contains the recipe's", () => {
    const result = scoreRecipe(recipe(1, "Soup", ["onion"]), ["onions"]);
    expect(result.usageScore).toBe(0);
  });

  it("scores zero coverage when the recipe lists no ingredients", () => {
    const result = scoreRecipe(recipe(1, "Toast"), ["bread"]);
    expect(result).toEqual({ usageScore: 0, coverageRatio: 0, titleBonus: 0, score: 0 });
  });

  it("stays within [0, 1]", () => {
    const candidates = [
      recipe(1, "Chicken Chicken", ["chicken", "chicken thigh"]),
      recipe(2, "Plain", [], ["flour", "water"]),
      recipe(3, "Garlic Bread", ["garlic"], ["bread"]),
    ];
    for (const candidate of candidates) {
      const { score } = scoreRecipe(candidate, ["chicken", "garlic"]);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe("rankRecipes", () => {
  it("orders best first and keeps source order on ties", () => {
    const weak = recipe(1, "Fruit Salad", [], ["apple"]);
    const tieA = recipe(2, "Rice Bowl", ["rice"], ["egg"]);
    const tieB = recipe(3, "Rice Pudding", ["rice"], ["milk"]);

    const ranked = rankRecipes([weak, tieA, tieB], ["rice"]);

    expect(ranked.map((r) => r.recipe.id)).toEqual([2, 3, 1]);
  });
});

describe("RecipeFinder", () => {
  it("asks the source with the configured count and ranking", async () => {
    const source = new FakeRecipeSource();
    source.candidates = [recipe(10, "Omelette", ["eggs"])];

    await new RecipeFinder(source, { ...options, candidateCount: 8, rankingMode: 2 }).findRecipe([
      "eggs",
    ]);

    expect(source.findCalls).toEqual([{ ingredients: ["eggs"], count: 8, rankingMode: 2 }]);
  });

  it("returns the highest scoring candidate", async () => {
    const source = new FakeRecipeSource();
    source.candidates = [
      recipe(101, "Onion Soup", ["onions"], ["beef broth", "bread"]),
      recipe(102, "Garlic Chicken", ["chicken breast", "garlic"], ["soy sauce"]),
    ];
    const finder = new RecipeFinder(source, options);

    const first = await finder.findRecipe(["chicken", "onions", "garlic"]);
    const second = await finder.findRecipe(["chicken", "onions", "garlic"]);

    expect(first.id).toBe(102);
    expect(second.id).toBe(first.id);
  });

  it("fails with NoRecipesFoundFailure on an empty candidate list", async () => {
    const source = new FakeRecipeSource();

    const attempt = new RecipeFinder(source, options).findRecipe(["dragonfruit"]);

    await expect(attempt).rejects.toBeInstanceOf(NoRecipesFoundFailure);
    await expect(attempt).rejects.toThrow("No recipes found for: dragonfruit");
    expect(source.findCalls).toHaveLength(1);
  });

  it("retries transient failures with backoff", async () => {
    delays.length = 0;
    const source = new FakeRecipeSource();
    source.findFailures = [
      new TimeoutFailure("spoonacular", 1000),
      new UpstreamServiceFailure("spoonacular", "HTTP 503: unavailable", 503),
    ];
    source.candidates = [recipe(7, "Pancakes", ["flour"])];

    const result = await new RecipeFinder(source, options).findRecipe(["flour"]);

    expect(result.id).toBe(7);
    expect(source.findCalls).toHaveLength(3);
    expect(delays).toEqual([10, 20]);
  });

  it("gives up after the configured attempts", async () => {
    const source = new FakeRecipeSource();
    const timeout = new TimeoutFailure("spoonacular", 1000);
    source.findFailures = [timeout, timeout, timeout];

    await expect(new RecipeFinder(source, options).findRecipe(["flour"])).rejects.toBe(timeout);
    expect(source.findCalls).toHaveLength(3);
  });

  it("does not retry client errors", async () => {
    const source = new FakeRecipeSource();
    source.findFailures = [new UpstreamServiceFailure("spoonacular", "HTTP 402: quota", 402)];

    await expect(new RecipeFinder(source, options).findRecipe(["flour"])).rejects.toBeInstanceOf(
      UpstreamServiceFailure
    );
    expect(source.findCalls).toHaveLength(1);
  });

  it("does not retry a malformed recipe payload", async () => {
    const http = axios.create();
    const get = vi.spyOn(http, "get").mockResolvedValue(axiosResponse({ results: "nope" }));
    const spoonacular = new SpoonacularService(
      { apiKey: "test-key", baseUrl: "http://spoonacular.test", timeoutMs: 1000 },
      http
    );

    await expect(new RecipeFinder(spoonacular, options).findRecipe(["flour"])).rejects.toBeInstanceOf(
      UpstreamServiceFailure
    );
    expect(get).toHaveBeenCalledTimes(1);
  });
});
