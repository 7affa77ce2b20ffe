// src/index.ts
import "dotenv/config";
import { serve } from "@hono/node-server";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { TranslatorContext } from "./services/context.js";

const config = loadConfig();

const app = createApp({
  context: TranslatorContext.fromConfig(config),
  staticDir: config.staticDir,
});

serve({
  fetch: app.fetch,
  port: config.port,
  hostname: "0.0.0.0",
});

console.log(`✅ Hono server listening on http://0.0.0.0:${config.port}`);
