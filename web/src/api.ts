// web/src/api.ts
import type { ZodType } from "zod";
import {
  credentialFailureSchema,
  statusResponseSchema,
  translateResponseSchema,
  type StatusResponse,
  type TranslateResponse,
} from "../../src/schemas.js";

// Same origin unless the API is hosted elsewhere
const API_BASE = import.meta.env.VITE_API_BASE ?? "";

/** The server could not load credentials; the form stops here. */
export class CredentialsUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CredentialsUnavailableError";
  }
}

export interface TranslatorApi {
  status(): Promise<StatusResponse>;
  translate(text: string, targetLanguage: string): Promise<TranslateResponse>;
}

async function readJson<T>(res: Response, schema: ZodType<T>): Promise<T> {
  const body: unknown = await res.json().catch(() => null);

  if (!res.ok) {
    const failure = credentialFailureSchema.safeParse(body);
    if (failure.success) throw new CredentialsUnavailableError(failure.data.detail);
    throw new Error(`Request failed (${res.status})`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new Error("Unexpected response from server");
  return parsed.data;
}

export const httpApi: TranslatorApi = {
  async status() {
    const res = await fetch(`${API_BASE}/api/status`);
    return readJson(res, statusResponseSchema);
  },

  async translate(text, targetLanguage) {
    const res = await fetch(`${API_BASE}/api/translate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text, target_language: targetLanguage }),
    });
    return readJson(res, translateResponseSchema);
  },
};
