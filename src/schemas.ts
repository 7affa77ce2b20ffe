// src/schemas.ts
// Wire shapes shared by the server routes and the web client.
import { z } from "zod";
import { isLanguageCode } from "./languages.js";

export const translateRequestSchema = z.object({
  text: z.string(),
  target_language: z.string().refine(isLanguageCode, {
    message: "Unsupported target language",
  }),
});

export const noticeSchema = z.object({
  level: z.enum(["error", "warning"]),
  message: z.string(),
});

export const translateResponseSchema = z.object({
  translated_text: z.string(),
  notices: z.array(noticeSchema),
});

export const statusResponseSchema = z.object({
  client: z.enum(["ready", "unavailable"]),
});

export const credentialFailureSchema = z.object({
  error: z.literal("credentials"),
  kind: z.string(),
  detail: z.string(),
});

export type Notice = z.infer<typeof noticeSchema>;
export type TranslateResponse = z.infer<typeof translateResponseSchema>;
export type StatusResponse = z.infer<typeof statusResponseSchema>;
