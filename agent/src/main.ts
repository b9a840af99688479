/**
 * Bootstrap. Wires config, catalog, resolver, tools, the model client and
 * the session together, then hands over to the CLI.
 */

import { openCatalog } from "#catalog/sqlite.js";
import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { LLMDecisionMaker } from "#llm/decision.js";
import { OpenAICompatibleClient } from "#llm/providers/openai-compatible/client.js";
import { RetryingLLMClient } from "#llm/resilience/retry.js";
import { createComponentLogger } from "#logging.js";
import { ProfileStore } from "#memory/profile-store.js";
import { OmdbClient } from "#omdb/client.js";
import { MovieResolver } from "#resolver/resolver.js";
import { loadPromptTemplate } from "#session/prompt.js";
import { Session } from "#session/session.js";
import { buildToolRegistry } from "#tools/index.js";

const log = createComponentLogger("main");

export async function main(): Promise<void> {
  const config = loadConfig();

  const catalog = openCatalog(config.catalogDbPath);
  const resolver = new MovieResolver(catalog, config.resolver);
  const omdb = new OmdbClient(config.omdbApiKey);
  const registry = buildToolRegistry({ catalog, resolver, omdb });

  if (!config.llm.apiKey) {
    log.warn("LLM_API_KEY is not set; requests will go out without credentials", { baseUrl: config.llm.baseUrl });
  }
  if (!omdb.configured) {
    log.info("OMDB_API_KEY is not set; OMDb tools will report themselves unavailable");
  }

  const llm = new RetryingLLMClient(
    new OpenAICompatibleClient("llm", config.llm.apiKey, config.llm.baseUrl, config.llm.model),
  );
  const decisionMaker = new LLMDecisionMaker(llm, registry.toNativeTools(), {
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });

  const store = new ProfileStore(config.profilePath);
  const session = new Session({
    decisionMaker,
    dispatcher: registry,
    promptTemplate: await loadPromptTemplate(),
    profile: await store.load(),
    store,
    maxSteps: config.maxSteps,
    historyLimit: config.historyLimit,
    onToolCall: tool => console.log(`  … ${tool}`),
  });

  log.info("Session ready", {
    sessionId: session.id,
    catalogSize: catalog.size,
    tools: registry.list().length,
    model: config.llm.model,
  });

  await runCli({ session, resolver });
}
