// src/config.ts
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  GOOGLE_CLOUD_PROJECT: z.string().min(1).optional(),
  GOOGLE_CLOUD_LOCATION: z.string().min(1).default("global"),
  SECRETS_FILE: z.string().min(1).default(".secrets/secrets.env"),
  STATIC_DIR: z.string().min(1).default("dist/public"),
});

export type AppConfig = {
  port: number;
  projectId?: string;
  location: string;
  secretsFile: string;
  staticDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const { PORT, GOOGLE_CLOUD_PROJECT, GOOGLE_CLOUD_LOCATION, SECRETS_FILE, STATIC_DIR } = parsed.data;
  return {
    port: PORT,
    projectId: GOOGLE_CLOUD_PROJECT,
    location: GOOGLE_CLOUD_LOCATION,
    secretsFile: SECRETS_FILE,
    staticDir: STATIC_DIR,
  };
}
