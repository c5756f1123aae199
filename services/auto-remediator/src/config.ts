import { z } from "zod";

const configSchema = z.object({
  DISCORD_WEBHOOK_URL: z.string().url(),
  SSM_DOCUMENT_NAME: z.string().min(1, "SSM_DOCUMENT_NAME is required"),
  AWS_REGION: z.string().min(1).default("ap-southeast-1"),
  MAINTENANCE_TAG_KEY: z.string().min(1).default("Maintenance"),
  NOTIFIER_USERNAME: z.string().min(1).default("Cloud Janitor"),
  PORT: z.coerce.number().int().positive().default(3000),
  WEBHOOK_SECRET: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}
