// src/app.ts
import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";

import { translateRequestSchema } from "./schemas.js";
import { CredentialError } from "./services/credentials.js";
import { Notices } from "./services/notices.js";
import type { TranslatorContext } from "./services/context.js";

export type AppOptions = {
  context: TranslatorContext;
  // built web app; omit to serve the API only
  staticDir?: string;
};

export function createApp({ context, staticDir }: AppOptions) {
  const app = new Hono();

  app.use("*", async (c, next) => {
    console.log("➡️", c.req.method, c.req.path);
    await next();
  });

  // global error handler
  app.onError((err, c) => {
    if (err instanceof CredentialError) {
      console.error("🔑 credentials:", err.message);
      return c.json({ error: "credentials", kind: err.kind, detail: err.message }, 503);
    }

    console.error("🔥 error:", err);
    return c.json(
      {
        error: "Internal Server Error",
        detail: err instanceof Error ? err.message : String(err),
      },
      500
    );
  });

  app.get("/health", (c) => c.json({ ok: true }));

  // Builds the client (and so resolves credentials) on first call.
  app.get("/api/status", async (c) => {
    const handle = await context.client();
    return c.json({ client: handle.status });
  });

  app.post("/api/translate", async (c) => {
    const req = await c.req.json().catch(() => ({}));

    const parsed = translateRequestSchema.safeParse(req);
    if (!parsed.success) return c.json({ error: parsed.error.format() }, 400);

    const { text, target_language } = parsed.data;
    const notices = new Notices();
    const translated_text = await context.translator.translate(text, target_language, notices);

    return c.json({ translated_text, notices: notices.items });
  });

  app.get("/api/languages/supported", async (c) => {
    const display = c.req.query("display") || "en";
    const notices = new Notices();
    const languages = await context.translator.listLanguages(display, notices);
    return c.json({ languages, notices: notices.items });
  });

  if (staticDir) {
    app.use("/*", serveStatic({ root: staticDir }));
  }

  return app;
}
