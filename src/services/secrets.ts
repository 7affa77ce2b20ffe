// src/services/secrets.ts
import { readFile } from "node:fs/promises";
import dotenv from "dotenv";

export interface SecretStore {
  get(name: string): Promise<string | undefined>;
}

/**
 * Secrets kept in a dotenv-format file outside the repo, e.g.
 *
 *   GOOGLE_CREDS='{"type":"service_account", ...}'
 *
 * A missing file is an empty store. The file is read once.
 */
export class FileSecretStore implements SecretStore {
  private entries?: Promise<Record<string, string>>;

  constructor(private readonly filePath: string) {}

  async get(name: string): Promise<string | undefined> {
    this.entries ??= this.load();
    const entries = await this.entries;
    return Object.hasOwn(entries, name) ? entries[name] : undefined;
  }

  private async load(): Promise<Record<string, string>> {
    try {
      return dotenv.parse(await readFile(this.filePath, "utf8"));
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
