import { config } from "./engine/config.js";
import { logger } from "./engine/logger.js";
import { EngineApp } from "./engine/app.js";

async function main(): Promise<void> {
  const engine = new EngineApp();

  try {
    await engine.start();
    logger.info(
      {
        httpPort: config.HTTP_PORT,
        metricsPort: config.PROMETHEUS_PORT,
        analysisWindowDays: config.ANALYSIS_WINDOW_DAYS,
        sentimentStrategy: config.OPENAI_API_KEY ? config.LLM_MODEL : "lexicon",
      },
      "Reputation engine started",
    );
  } catch (error) {
    logger.error({ error }, "Failed to start reputation engine");
    process.exit(1);
  }
}

void main();
