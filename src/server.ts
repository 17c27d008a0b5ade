/**
 * Application entry point for the memory gateway.
 *
 * Loads configuration (refusing to start without an OpenAI key), initializes
 * the memory engine once, and serves the HTTP API. An engine that fails to
 * initialize leaves the process running in a degraded state: `/` reports
 * `error` and every other route answers 503.
 */
import { config } from "@config/index";
import { initializeEngine } from "@domain/memory/engineState";
import { createMemoryEngine } from "@infrastructure/memory/createMemoryEngine";
import { describeError, logger } from "@infrastructure/logging/Logger";

import { createApp, listen } from "./httpApp";

async function main(): Promise<void> {
  const state = await initializeEngine(() => createMemoryEngine(config));
  const app = createApp(state, {
    corsOrigin: config.server.corsOrigin,
    bodyLimit: config.server.bodyLimit,
  });

  await listen(app, config.server.port, config.server.host);

  logger.log("info", "SERVER_STARTED", {
    url: `http://${config.server.host}:${config.server.port}`,
    engine: state.status,
    embeddingModel: config.embedder.model,
    llmModel: config.llm.model,
    collection: config.vectorStore.collection,
  });
}

main().catch((error: unknown) => {
  logger.log("error", "SERVER_START_FAILED", describeError(error));
  process.exit(1);
});
