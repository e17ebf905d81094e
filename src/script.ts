import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { FileEncoding } from "./generation/schema.js";

export interface ScriptArtifact {
  fileName: string;
  content: string;
  encoding: FileEncoding;
}

export interface ScriptArtifactOptions {
  taskDescription: string;
  includeHeader: boolean;
  encoding: FileEncoding;
  author?: string;
  now?: Date;
}

const FENCE = /```(?:powershell|pwsh|ps1)\s*([\s\S]*?)\s*```/i;

/** The first PowerShell fenced block, or the whole reply when there is none. */
export function extractScript(response: string): string {
  const match = response.match(FENCE);
  if (match) return match[1].trim();
  return response.trim();
}

export function scriptFileName(description: string): string {
  const slug = description
    .slice(0, 30)
    .trim()
    .replace(/ /g, "_")
    .toLowerCase()
    .replace(/[^a-z0-9_.-]/g, "");
  return `command_${slug || "script"}.ps1`;
}

const pad = (n: number) => String(n).padStart(2, "0");

function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

const RULE = `#${"=".repeat(79)}`;

export function renderBanner(now: Date, author?: string): string {
  const lines = [RULE, "# Script generated by pwsh-forge", `# Date: ${formatTimestamp(now)}`];
  if (author) lines.push(`# Author: ${author}`);
  lines.push(RULE);
  return lines.join("\n") + "\n";
}

export function buildScriptArtifact(response: string, options: ScriptArtifactOptions): ScriptArtifact {
  let content = extractScript(response);
  if (options.includeHeader) {
    content = renderBanner(options.now ?? new Date(), options.author) + content;
  }
  return {
    fileName: scriptFileName(options.taskDescription),
    content,
    encoding: options.encoding,
  };
}

// Characters the target code page cannot hold become "?".
export function encodeScript(content: string, encoding: FileEncoding): Buffer {
  switch (encoding) {
    case "ascii":
      return Buffer.from(content.replace(/[^\x00-\x7F]/gu, "?"), "latin1");
    case "ansi":
      return Buffer.from(content.replace(/[^\x00-\xFF]/gu, "?"), "latin1");
    default:
      return Buffer.from(content, "utf8");
  }
}

export async function writeScript(dir: string, artifact: ScriptArtifact): Promise<string> {
  await mkdir(dir, { recursive: true });
  const target = join(dir, artifact.fileName);
  await writeFile(target, encodeScript(artifact.content, artifact.encoding));
  return target;
}
