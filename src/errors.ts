export type ChatbotErrorCode =
  | "CONFIGURATION_ERROR"
  | "CLASSIFICATION_FAILURE"
  | "EMPTY_EXTRACTION"
  | "NO_RECIPES_FOUND"
  | "TIMEOUT"
  | "AUTHENTICATION_FAILURE"
  | "EMPTY_RESPONSE"
  | "UPSTREAM_FAILURE"
  | "RECIPE_FORMAT_FAILURE"
  | "NO_ACTIVE_RECIPE";

/**
 * Base class for every failure the chatbot raises on purpose.
 * `status` is what the HTTP layer answers with.
 */
export class ChatbotError extends Error {
  readonly code: ChatbotErrorCode;
  readonly status: number;

  constructor(
    code: ChatbotErrorCode,
    message: string,
    status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ConfigurationError extends ChatbotError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message, 500);
  }
}

export class ClassificationFailure extends ChatbotError {
  constructor(message: string, cause?: unknown) {
    super("CLASSIFICATION_FAILURE", message, 502, { cause });
  }
}

export class EmptyExtractionFailure extends ChatbotError {
  constructor(message = "No ingredients could be extracted", cause?: unknown) {
    super("EMPTY_EXTRACTION", message, 422, { cause });
  }
}

export class NoRecipesFoundFailure extends ChatbotError {
  readonly ingredients: string[];

  constructor(ingredients: string[]) {
    super(
      "NO_RECIPES_FOUND",
      `No recipes found for: ${ingredients.join(", ")}`,
      404
    );
    this.ingredients = ingredients;
  }
}

export class TimeoutFailure extends ChatbotError {
  readonly service: string;

  constructor(service: string, timeoutMs?: number, cause?: unknown) {
    super(
      "TIMEOUT",
      timeoutMs
        ? `${service} did not answer within ${timeoutMs}ms`
        : `${service} timed out`,
      504,
      { cause }
    );
    this.service = service;
  }
}

export class AuthenticationFailure extends ChatbotError {
  constructor(message: string, cause?: unknown) {
    super("AUTHENTICATION_FAILURE", message, 502, { cause });
  }
}

export class EmptyResponseFailure extends ChatbotError {
  constructor(provider: string) {
    super("EMPTY_RESPONSE", `Empty completion from ${provider}`, 502);
  }
}

export class UpstreamServiceFailure extends ChatbotError {
  readonly service: string;
  readonly upstreamStatus?: number;

  constructor(
    service: string,
    message: string,
    upstreamStatus?: number,
    cause?: unknown
  ) {
    super("UPSTREAM_FAILURE", `${service}: ${message}`, 502, { cause });
    this.service = service;
    this.upstreamStatus = upstreamStatus;
  }
}

export class RecipeFormatFailure extends ChatbotError {
  constructor(message: string, cause?: unknown) {
    super("RECIPE_FORMAT_FAILURE", message, 502, { cause });
  }
}

export class NoActiveRecipeError extends ChatbotError {
  constructor(sessionId: string) {
    super(
      "NO_ACTIVE_RECIPE",
      `Session ${sessionId} has no recipe yet; send your ingredients first`,
      404
    );
  }
}
