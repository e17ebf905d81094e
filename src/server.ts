import express, { type NextFunction, type Request, type Response } from "express";
import { fileURLToPath } from "url";
import type { Server } from "http";
import { z } from "zod";
import { InvalidConfigError, ModelCallError, type ModelErrorKind } from "./errors.js";
import type { ScriptGenerator } from "./generator.js";
import { PRESETS } from "./generation/presets.js";
import {
  DETAIL_LEVELS,
  FILE_ENCODINGS,
  FileEncodingSchema,
  GENERATION_DEFAULTS,
  LOGGING_LEVELS,
  MAX_OUTPUT_TOKENS,
  MODEL_NAMES,
  POWERSHELL_VERSIONS,
  PROMPT_PRESETS,
  SCRIPT_TYPES,
  SECURITY_LEVELS,
  TARGET_OS_OPTIONS,
  VERBOSITY_LEVELS,
  parseGenerationConfig,
} from "./generation/schema.js";
import { createLogger } from "./logger.js";
import { encodeScript } from "./script.js";

const log = createLogger("server");

// public/ sits beside both src/ and dist/.
const FORM_PATH = fileURLToPath(new URL("../public/index.html", import.meta.url));

export interface AppOptions {
  generator: ScriptGenerator;
  defaults?: Record<string, unknown>;
}

const DownloadSchema = z.object({
  fileName: z.string().regex(/^[\w.-]+\.ps1$/, "file name must be a plain .ps1 name"),
  content: z.string(),
  encoding: FileEncodingSchema.default("utf-8"),
});

const MODEL_ERROR_STATUS: Partial<Record<ModelErrorKind, number>> = {
  rate_limit: 429,
  timeout: 504,
};

function sendError(res: Response, err: unknown): boolean {
  if (err instanceof InvalidConfigError) {
    res.status(400).json({ error: "invalid_config", message: err.message, issues: err.issues });
    return true;
  }
  if (err instanceof ModelCallError) {
    res.status(MODEL_ERROR_STATUS[err.kind] ?? 502).json({ error: err.kind, message: err.message });
    return true;
  }
  return false;
}

export function createApp(options: AppOptions): express.Express {
  const { generator } = options;
  const defaults = { ...GENERATION_DEFAULTS, ...(options.defaults ?? {}) };
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  const submission = (body: unknown) =>
    parseGenerationConfig({ ...defaults, ...(typeof body === "object" && body !== null ? body : {}) });

  app.get("/", (_req, res) => {
    res.sendFile(FORM_PATH);
  });

  app.get("/api/options", (_req, res) => {
    res.json({
      models: MODEL_NAMES,
      presets: PROMPT_PRESETS.map((id) => ({ id, label: id === "none" ? "None" : PRESETS[id].label })),
      detailLevels: DETAIL_LEVELS,
      powershellVersions: POWERSHELL_VERSIONS,
      targetOs: TARGET_OS_OPTIONS,
      encodings: FILE_ENCODINGS,
      verbosity: VERBOSITY_LEVELS,
      scriptTypes: SCRIPT_TYPES,
      securityLevels: SECURITY_LEVELS,
      loggingLevels: LOGGING_LEVELS,
      maxTokens: MAX_OUTPUT_TOKENS,
      defaults,
    });
  });

  app.post("/api/prompt", (req, res, next) => {
    try {
      res.json({ prompt: generator.preview(submission(req.body)) });
    } catch (err) {
      if (!sendError(res, err)) next(err);
    }
  });

  app.post("/api/generate", async (req, res, next) => {
    try {
      const config = submission(req.body);
      const result = await generator.generate(config);
      res.json({ prompt: result.prompt, response: result.response, script: result.script });
    } catch (err) {
      if (!sendError(res, err)) next(err);
    }
  });

  app.post("/api/download", (req, res) => {
    const parsed = DownloadSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, InvalidConfigError.fromZod(parsed.error));
      return;
    }
    const { fileName, content, encoding } = parsed.data;
    res.attachment(fileName);
    res.type("application/octet-stream");
    res.send(encodeScript(content, encoding));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser reports malformed JSON as a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json" });
      return;
    }
    log.error(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ error: "internal" });
  });

  return app;
}

export function startServer(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`Web form running at http://localhost:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
