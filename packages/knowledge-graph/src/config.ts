import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default(""),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default(""),
  NEO4J_HTTP_PORT: z.coerce.number().int().positive().default(7474)
});

export type KnowledgeGraphConfig = z.infer<typeof envSchema>;
export const appConfig: KnowledgeGraphConfig = envSchema.parse(process.env);

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
