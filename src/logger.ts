import { appendFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { existsSync } from 'fs';
import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = 'info';
let metricsEnabled = true;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function setMetricsEnabled(enabled: boolean): void {
  metricsEnabled = enabled;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PAINT: Record<LogLevel, (s: string) => string> = {
  debug: pc.gray,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Console logger. Everything goes to stderr so `--stdout` output stays clean.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    process.stderr.write(`${PAINT[level](`[${scope}]`)} ${message}\n`);
  };
  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

function getMetricsDir() {
  return join(process.cwd(), '.pwsh-forge', 'metrics');
}

async function ensureMetricsDir() {
  const dir = getMetricsDir();
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
}

export interface MetricTags {
  [key: string]: string | number | boolean;
}

/**
 * Log a structured metric to the daily ndjson file.
 * Failures are reported on stderr and never reach the caller.
 *
 * @param agent - The source of the metric (e.g., 'llm', 'generator')
 * @param metric - The name of the metric (e.g., 'latency', 'tokens')
 */
export async function logMetric(
  agent: string,
  metric: string,
  value: number,
  tags: MetricTags = {}
): Promise<void> {
  if (!metricsEnabled) return;
  try {
    await ensureMetricsDir();

    const date = new Date().toISOString().split('T')[0];
    const filename = join(getMetricsDir(), `${date}.ndjson`);

    const entry = {
      timestamp: new Date().toISOString(),
      agent,
      metric,
      value,
      tags
    };

    await appendFile(filename, JSON.stringify(entry) + '\n');
  } catch (error) {
    console.error(`[Metrics] Failed to write metric ${metric}:`, error);
  }
}
