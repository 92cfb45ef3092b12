import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { AnthropicGateway } from "./providers/llmGateway";

loadDotenv({ path: resolve(__dirname, "../../../.env"), override: false });

async function start() {
  const config = loadConfig();
  const app = buildApp({
    generator: new AnthropicGateway(config.llm),
    maxTokens: config.maxTokens,
    retryLimit: config.retryLimit,
    logger: { level: config.logLevel },
  });

  await app.listen({ port: config.server.port, host: config.server.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
