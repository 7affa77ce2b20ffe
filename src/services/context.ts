// src/services/context.ts
import type { AppConfig } from "../config.js";
import { resolveCredentials, type CredentialPayload } from "./credentials.js";
import { FileSecretStore, type SecretStore } from "./secrets.js";
import {
  TranslateFacade,
  createGoogleTranslationClient,
  type ClientHandle,
  type TranslationClient,
} from "./translate.js";

/** First call starts init; every later call gets the same promise, even a rejected one. */
export function once<T>(init: () => Promise<T>): () => Promise<T> {
  let value: Promise<T> | undefined;
  return () => (value ??= init());
}

export type TranslatorContextOptions = {
  env: NodeJS.ProcessEnv;
  secrets: SecretStore;
  createClient: (credentials: CredentialPayload) => TranslationClient;
};

/**
 * Process-wide handles: credentials, the client built from them, and the
 * facade's result cache. Nothing is resolved until first use.
 */
export class TranslatorContext {
  readonly credentials: () => Promise<CredentialPayload | null>;
  readonly client: () => Promise<ClientHandle>;
  readonly translator: TranslateFacade;

  constructor({ env, secrets, createClient }: TranslatorContextOptions) {
    this.credentials = once(() => resolveCredentials({ env, secrets }));

    this.client = once(async (): Promise<ClientHandle> => {
      const creds = await this.credentials();
      if (!creds) return { status: "unavailable" };
      return { status: "ready", client: createClient(creds) };
    });

    this.translator = new TranslateFacade(this.client);
  }

  static fromConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): TranslatorContext {
    return new TranslatorContext({
      env,
      secrets: new FileSecretStore(config.secretsFile),
      createClient: (creds) =>
        createGoogleTranslationClient(creds, {
          location: config.location,
          projectId: config.projectId,
        }),
    });
  }
}
