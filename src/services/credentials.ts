// src/services/credentials.ts
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { isNotFound, type SecretStore } from "./secrets.js";

export const CREDENTIALS_ENV_VAR = "GOOGLE_APPLICATION_TRANSLATE_CREDENTIALS_JSON";
export const CREDENTIALS_SECRET = "GOOGLE_CREDS";

const payloadSchema = z.record(z.union([z.string(), z.number()])).nullable();

/** Parsed service account key (project_id, client_email, private_key, ...). */
export type CredentialPayload = Record<string, string | number>;

export type CredentialErrorKind =
  | "source-missing"
  | "file-missing"
  | "malformed-json"
  | "unreadable";

export class CredentialError extends Error {
  constructor(
    readonly kind: CredentialErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CredentialError";
  }
}

export type ResolveOptions = {
  env: NodeJS.ProcessEnv;
  secrets: SecretStore;
};

/**
 * Finds the service account key. The environment variable wins when it is set
 * at all; the secret store is only consulted when it is absent.
 *
 * Resolves to null when the key parses to nothing (JSON null or {}).
 * Throws CredentialError for every other failure.
 */
export async function resolveCredentials({
  env,
  secrets,
}: ResolveOptions): Promise<CredentialPayload | null> {
  const envValue = env[CREDENTIALS_ENV_VAR];

  if (envValue !== undefined) {
    const malformed = `Error decoding the JSON string or file in ${CREDENTIALS_ENV_VAR}. Please check the format.`;
    const raw = await readEnvSource(envValue);
    const payload = parsePayload(raw, malformed);
    console.log(`🔑 credentials loaded from ${CREDENTIALS_ENV_VAR}`);
    return payload;
  }

  let secret: string | undefined;
  try {
    secret = await secrets.get(CREDENTIALS_SECRET);
  } catch (err) {
    throw new CredentialError(
      "unreadable",
      `Unexpected error loading the ${CREDENTIALS_SECRET} secret: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (secret === undefined) {
    throw new CredentialError(
      "source-missing",
      `No Google credentials found. Please set the ${CREDENTIALS_ENV_VAR} environment variable or the ${CREDENTIALS_SECRET} secret.`
    );
  }

  const payload = parsePayload(
    secret,
    `Error decoding the ${CREDENTIALS_SECRET} secret. Please check the secrets file format.`
  );
  console.log(`🔑 credentials loaded from secret ${CREDENTIALS_SECRET}`);
  return payload;
}

// The variable holds either a path to a .json key file or the key itself.
async function readEnvSource(value: string): Promise<string> {
  const looksLikePath =
    path.extname(value).toLowerCase() === ".json" && !value.trimStart().startsWith("{");

  if (!looksLikePath) return value;

  try {
    if (!(await stat(value)).isFile()) return value;
    return await readFile(value, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new CredentialError(
        "file-missing",
        `Error: The file path specified in ${CREDENTIALS_ENV_VAR} does not exist: ${value}`,
        { cause: err }
      );
    }
    throw new CredentialError(
      "unreadable",
      `Unexpected error loading credentials from environment variable: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

function parsePayload(raw: string, malformedMessage: string): CredentialPayload | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CredentialError("malformed-json", malformedMessage, { cause: err });
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new CredentialError("malformed-json", malformedMessage, { cause: parsed.error });
  }

  const payload = parsed.data;
  if (payload === null || Object.keys(payload).length === 0) return null;
  return payload;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
