// src/services/translate.ts
import { TranslationServiceClient } from "@google-cloud/translate";
import { CredentialError, errorMessage, type CredentialPayload } from "./credentials.js";
import type { Notices } from "./notices.js";

export type SupportedLanguage = { code: string; name: string };

export interface TranslationClient {
  translate(text: string, targetLanguage: string): Promise<string>;
  listLanguages(displayLanguage: string): Promise<SupportedLanguage[]>;
}

export type ClientHandle =
  | { status: "ready"; client: TranslationClient }
  | { status: "unavailable" };

export type GoogleClientOptions = {
  location: string;
  projectId?: string;
};

/**
 * Cloud Translation v3 client bound to one service account key.
 */
export function createGoogleTranslationClient(
  credentials: CredentialPayload,
  { location, projectId: fallbackProjectId }: GoogleClientOptions
): TranslationClient {
  const projectId = stringField(credentials, "project_id") ?? fallbackProjectId;
  if (!projectId) {
    throw new CredentialError(
      "malformed-json",
      "The service account key has no project_id and GOOGLE_CLOUD_PROJECT is not set."
    );
  }

  const client = new TranslationServiceClient({
    credentials: {
      client_email: stringField(credentials, "client_email"),
      private_key: stringField(credentials, "private_key"),
    },
    projectId,
  });

  // v3: parent format
  const parent = `projects/${projectId}/locations/${location}`;

  return {
    async translate(text, targetLanguage) {
      const [response] = await client.translateText({
        parent,
        contents: [text],
        mimeType: "text/plain",
        targetLanguageCode: targetLanguage,
      });
      return response.translations?.[0]?.translatedText ?? "";
    },

    async listLanguages(displayLanguage) {
      const [response] = await client.getSupportedLanguages({
        parent,
        displayLanguageCode: displayLanguage,
      });
      return (response.languages ?? []).flatMap((l) =>
        l.languageCode ? [{ code: l.languageCode, name: l.displayName || l.languageCode }] : []
      );
    },
  };
}

function stringField(payload: CredentialPayload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * One remote call per (text, target) pair for the life of the process.
 * Failures are reported on the caller's notices and are not cached.
 */
export class TranslateFacade {
  private readonly results = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(private readonly getClient: () => Promise<ClientHandle>) {}

  async translate(text: string, targetLanguage: string, notices: Notices): Promise<string> {
    const handle = await this.getClient();
    if (handle.status === "unavailable") {
      notices.error("Translation client could not be initialized. Please check your credentials.");
      return "";
    }

    if (!text) return "";

    const key = JSON.stringify([text, targetLanguage]);
    const cached = this.results.get(key);
    if (cached !== undefined) return cached;

    let call = this.inFlight.get(key);
    if (!call) {
      call = handle.client.translate(text, targetLanguage);
      this.inFlight.set(key, call);
    }

    try {
      const translated = await call;
      this.results.set(key, translated);
      return translated;
    } catch (err) {
      notices.error(`Translation failed. Error: ${errorMessage(err)}`);
      return "";
    } finally {
      this.inFlight.delete(key);
    }
  }

  async listLanguages(displayLanguage: string, notices: Notices): Promise<SupportedLanguage[]> {
    const handle = await this.getClient();
    if (handle.status === "unavailable") {
      notices.error("Translation client could not be initialized. Please check your credentials.");
      return [];
    }

    try {
      return await handle.client.listLanguages(displayLanguage);
    } catch (err) {
      notices.error(`Could not list supported languages. Error: ${errorMessage(err)}`);
      return [];
    }
  }
}
