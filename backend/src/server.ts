import { loadEnv } from "./config/env";
import { createApp, parseAllowedOrigins } from "./app";
import { assertDatabaseConnection, createPool } from "./db/pool";
import { getRubricConfig, parseRubricConfig } from "./eval/rubrics/types";
import { PgResultStore } from "./store/pgResultStore";
import { DelegatedScorer, HeuristicScorer, createOpenAITextGenerator } from "./services/evaluation";
import { DelegatedScorerUnavailableError, RubricConfigurationError } from "./services/evaluation/errors";

const RUBRIC_VERSION = "voice-agent-v1";

async function bootstrap() {
  const env = loadEnv();

  const baseRubric = getRubricConfig(RUBRIC_VERSION);
  if (!baseRubric) {
    throw new RubricConfigurationError(`Unknown rubric ${RUBRIC_VERSION}`);
  }
  const rubric = parseRubricConfig({ ...baseRubric, passThreshold: env.PASS_THRESHOLD });

  const pool = createPool(env.DATABASE_URL);
  await assertDatabaseConnection(pool);

  const delegated = env.OPENAI_API_KEY
    ? new DelegatedScorer(
        createOpenAITextGenerator({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }),
        {
          minIntervalMs: env.DELEGATED_MIN_INTERVAL_MS,
          timeoutMs: env.DELEGATED_TIMEOUT_MS,
          maxConcurrent: env.DELEGATED_MAX_CONCURRENCY
        }
      )
    : null;
  if (!delegated) {
    if (env.SCORING_STRATEGY === "delegated") throw new DelegatedScorerUnavailableError();
    console.warn("[server] OPENAI_API_KEY not set; delegated scoring is disabled");
  }

  const app = createApp({
    store: new PgResultStore(pool, rubric.passThreshold),
    rubric,
    strategies: { heuristic: new HeuristicScorer(rubric), delegated },
    defaultStrategy: env.SCORING_STRATEGY,
    signalOptions: { complexity: env.COMPLEXITY_VARIANT, urgency: env.URGENCY_VARIANT },
    batch: { concurrency: env.BATCH_CONCURRENCY, timeoutMs: env.BATCH_TIMEOUT_MS },
    jwtSecret: env.JWT_SECRET,
    allowedOrigins: parseAllowedOrigins(env.FRONTEND_ORIGIN)
  });
  app.listen(env.PORT, () => {
    console.log(`Backend listening on http://localhost:${env.PORT}`);
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start backend:", error);
  process.exit(1);
});
