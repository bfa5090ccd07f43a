import { z } from "zod";
import { ConfigError } from "../errors";

export const REQUIRED_ENV_VARS = ["GEMINI_API_KEY", "APIFY_API_TOKEN"] as const;

const CredentialsSchema = z.object({
  GEMINI_API_KEY: z.string().trim().min(1),
  APIFY_API_TOKEN: z.string().trim().min(1),
});

export type Credentials = {
  geminiApiKey: string;
  apifyToken: string;
};

export function missingEnvVars(env: Record<string, string | undefined> = process.env): string[] {
  return REQUIRED_ENV_VARS.filter((name) => !(env[name] ?? "").trim());
}

export function loadCredentials(env: Record<string, string | undefined> = process.env): Credentials {
  const parsed = CredentialsSchema.safeParse(env);
  if (!parsed.success) {
    const missing = missingEnvVars(env);
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`, { missing });
  }
  return { geminiApiKey: parsed.data.GEMINI_API_KEY, apifyToken: parsed.data.APIFY_API_TOKEN };
}
