export class RubricConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RubricConfigurationError";
  }
}

export class InvalidCriterionScoresError extends Error {
  constructor(public conversationId: string, detail: string) {
    super(`Invalid criterion scores for ${conversationId}: ${detail}`);
    this.name = "InvalidCriterionScoresError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class DelegatedScorerUnavailableError extends Error {
  constructor() {
    super("Delegated scoring is not configured (OPENAI_API_KEY is missing)");
    this.name = "DelegatedScorerUnavailableError";
  }
}
