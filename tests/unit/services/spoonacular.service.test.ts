import axios from "axios";
import { describe, it, expect, vi } from "vitest";
import { TimeoutFailure, UpstreamServiceFailure } from "../../../src/errors";
import { isTransientFailure } from "../../../src/services/http-errors";
import { SpoonacularService } from "../../../src/services/spoonacular.service";
import { axiosHttpError, axiosResponse, axiosTimeoutError } from "../../helpers/fakes";

const config = { apiKey: "test-key", baseUrl: "http://spoonacular.test", timeoutMs: 1000 };

function setup() {
  const http = axios.create();
  const get = vi.spyOn(http, "get");
  return { get, service: new SpoonacularService(config, http) };
}

describe("SpoonacularService.findByIngredients", () => {
  it("queries by ingredients and validates the payload", async () => {
    const { get, service } = setup();
    get.mockResolvedValue(
      axiosResponse([
        {
          id: 1,
          title: "Omelette",
          usedIngredients: [{ id: 5, name: "eggs", amount: 2, unit: "", extra: "ignored" }],
          missedIngredients: [],
          likes: 3,
        },
      ])
    );

    const recipes = await service.findByIngredients(["chicken", "garlic"], 5, 1);

    expect(get).toHaveBeenCalledWith("/recipes/findByIngredients", {
      params: { ingredients: "chicken,garlic", number: 5, ranking: 1, apiKey: "test-key" },
      timeout: 1000,
    });
    expect(recipes).toEqual([
      {
        id: 1,
        title: "Omelette",
        usedIngredients: [{ id: 5, name: "eggs", amount: 2, unit: "" }],
        missedIngredients: [],
        unusedIngredients: [],
        likes: 3,
      },
    ]);
  });

  it("returns an empty list as is", async () => {
    const { get, service } = setup();
    get.mockResolvedValue(axiosResponse([]));

    expect(await service.findByIngredients(["dragonfruit"], 5, 2)).toEqual([]);
  });

  it("rejects a payload that is not a recipe list", async () => {
    const { get, service } = setup();
    get.mockResolvedValue(axiosResponse({ status: "failure", message: "quota" }));

    await expect(service.findByIngredients(["eggs"], 5, 1)).rejects.toBeInstanceOf(
      UpstreamServiceFailure
    );
  });

  it("does not treat a malformed payload as transient", async () => {
    const { get, service } = setup();
    get.mockResolvedValue(axiosResponse({ status: "failure", message: "quota" }));

    const error = await service.findByIngredients(["eggs"], 5, 1).catch((e: unknown) => e);

    expect(error).toHaveProperty("upstreamStatus", 200);
    expect(isTransientFailure(error)).toBe(false);
  });

  it("maps a timeout to TimeoutFailure", async () => {
    const { get, service } = setup();
    get.mockRejectedValue(axiosTimeoutError());

    await expect(service.findByIngredients(["eggs"], 5, 1)).rejects.toBeInstanceOf(TimeoutFailure);
  });

  it("keeps the HTTP status of upstream errors", async () => {
    const { get, service } = setup();
    get.mockRejectedValue(axiosHttpError(402, "daily quota used up"));

    await expect(service.findByIngredients(["eggs"], 5, 1)).rejects.toMatchObject({
      upstreamStatus: 402,
      message: "Spoonacular: HTTP 402: daily quota used up",
    });
  });
});

describe("SpoonacularService.getRecipeDetail", () => {
  it("reads recipe information", async () => {
    const { get, service } = setup();
    get.mockResolvedValue(
      axiosResponse({ id: 42, title: "Garlic Chicken", readyInMinutes: 25, servings: 2 })
    );

    const detail = await service.getRecipeDetail(42);

    expect(get).toHaveBeenCalledWith("/recipes/42/information", {
      params: { apiKey: "test-key" },
      timeout: 1000,
    });
    expect(detail).toEqual({
      id: 42,
      title: "Garlic Chicken",
      readyInMinutes: 25,
      servings: 2,
      analyzedInstructions: [],
    });
  });

  it("returns null for an unknown recipe", async () => {
    const { get, service } = setup();
    get.mockRejectedValue(axiosHttpError(404));

    expect(await service.getRecipeDetail(404404)).toBeNull();
  });

  it("fails on server errors", async () => {
    const { get, service } = setup();
    get.mockRejectedValue(axiosHttpError(500, "oops"));

    await expect(service.getRecipeDetail(42)).rejects.toBeInstanceOf(UpstreamServiceFailure);
  });
});
