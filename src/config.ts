import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";
import { ModelNameSchema } from "./generation/schema.js";
import { createLogger } from "./logger.js";

const log = createLogger("config");

export const CONFIG_LOCATIONS = ["pwsh-forge.json", join(".pwsh-forge", "config.json")];

export const AppConfigSchema = z.object({
  // Form defaults; validated field by field when a submission is parsed.
  defaults: z.record(z.unknown()).optional(),
  model: z.object({
    timeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(0).max(5).optional(),
  }).optional(),
  server: z.object({
    port: z.number().int().min(1).max(65535).optional(),
  }).optional(),
  outputDir: z.string().optional(),
  author: z.string().optional(),
  metrics: z.boolean().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type FileConfig = z.infer<typeof AppConfigSchema>;

export interface Config {
  apiKey?: string;
  defaults: Record<string, unknown>;
  model: { timeoutMs: number; maxRetries: number };
  server: { port: number };
  outputDir: string;
  author?: string;
  metrics: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
}

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_PORT = 3000;

async function readFileConfig(cwd: string): Promise<FileConfig> {
  for (const rel of CONFIG_LOCATIONS) {
    const loc = join(cwd, rel);
    if (!existsSync(loc)) continue;
    try {
      const content = await readFile(loc, "utf-8");
      const parsed = AppConfigSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
      log.warn(`Ignoring invalid config at ${loc}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    } catch (e) {
      log.warn(`Failed to parse config at ${loc}: ${e instanceof Error ? e.message : String(e)}`);
    }
    break;
  }
  return {};
}

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export async function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const file = await readFileConfig(cwd);

  const defaults: Record<string, unknown> = { ...(file.defaults ?? {}) };
  const envModel = ModelNameSchema.safeParse(env.PWSH_FORGE_MODEL);
  if (envModel.success) {
    defaults.model_name = envModel.data;
  } else if (env.PWSH_FORGE_MODEL) {
    log.warn(`Ignoring unsupported PWSH_FORGE_MODEL=${env.PWSH_FORGE_MODEL}`);
  }

  const logLevel = z.enum(["debug", "info", "warn", "error"]).safeParse(env.PWSH_FORGE_LOG_LEVEL);

  return {
    apiKey: env.GEMINI_API_KEY || env.GOOGLE_GENERATIVE_AI_API_KEY || undefined,
    defaults,
    model: {
      timeoutMs: envInt(env.PWSH_FORGE_TIMEOUT_MS) ?? file.model?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: file.model?.maxRetries ?? 2,
    },
    server: {
      port: envInt(env.PORT) ?? file.server?.port ?? DEFAULT_PORT,
    },
    outputDir: resolve(cwd, file.outputDir ?? "."),
    author: file.author,
    metrics: env.PWSH_FORGE_METRICS === "0" ? false : file.metrics ?? true,
    logLevel: logLevel.success ? logLevel.data : file.logLevel ?? "info",
  };
}
