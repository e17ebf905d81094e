import { afterAll, beforeAll } from "vitest";
import fs from "fs";
import path from "path";
import { setLogLevel, setMetricsEnabled } from "../src/logger.js";

// Keep test runs from writing .pwsh-forge/metrics into the repo and from
// cluttering the reporter with info lines.
beforeAll(() => {
  setMetricsEnabled(false);
  setLogLevel("error");
});

const logPath = path.join(process.cwd(), ".vitest_unhandled.log");

function appendLog(msg: string) {
  try {
    fs.appendFileSync(logPath, `[${new Date().toISOString()}] ${msg}\n`);
  } catch {
    /* ignore */
  }
}

const onRejection = (reason: unknown) => {
  appendLog("unhandledRejection: " + (reason instanceof Error && reason.stack ? reason.stack : String(reason)));
};

process.on("unhandledRejection", onRejection);

afterAll(() => {
  process.off("unhandledRejection", onRejection);
});
