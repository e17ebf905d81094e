/**
 * Instruction compiler: turns a GenerationConfig into the single prompt sent
 * to the model.
 *
 * Layout is preamble, task, constraints, output directive. Clauses come from
 * a fixed table in a fixed order and are emitted as unnumbered bullets, so
 * switching one field on adds exactly one line.
 */
import { InvalidConfigError } from "../errors.js";
import { applyPreset } from "./presets.js";
import { GenerationConfigSchema, type GenerationConfig } from "./schema.js";

const PREAMBLE = "You are a PowerShell expert. Write one complete, working PowerShell script for the task below.";

const BASELINE_RULES = [
  "Keep the script's full vertical formatting: one statement per line with consistent indentation.",
  "Use realistic names, paths and values instead of placeholders.",
  "Read and write files directly on the file system instead of asking for their contents on screen.",
  "Chain commands with the pipeline where it helps; never start or end a line with a semicolon.",
];

const OUTPUT_DIRECTIVE =
  "Return PowerShell code only, in a single fenced code block that starts with ```powershell and ends with ```. Do not write any text outside the code block.";

type ClauseRule = (config: GenerationConfig) => string | null;

// Order here is the order in the prompt.
const CLAUSE_TABLE: ClauseRule[] = [
  (c) => {
    switch (c.prompt_detail_level) {
      case "low": return "Keep the script minimal: solve the task directly without optional extras.";
      case "high": return "Be exhaustive: cover edge cases, parameter validation and alternative inputs the task implies.";
      default: return null;
    }
  },
  (c) => {
    switch (c.verbosity) {
      case "terse": return "Keep inline comments to a minimum.";
      case "verbose": return "Comment each logical section of the script.";
      default: return null;
    }
  },
  (c) => c.script_type === "interactive"
    ? "The script may prompt the user for input and ask for confirmation before destructive actions."
    : null,
  (c) => c.include_header
    ? "Begin the script with a comment-based help block (.SYNOPSIS, .DESCRIPTION, .EXAMPLE)."
    : null,
  (c) => {
    switch (c.file_encoding) {
      case "ascii": return "Use only ASCII characters in the script.";
      case "ansi": return "Use only characters from the Windows-1252 (ANSI) code page.";
      default: return null;
    }
  },
  (c) => c.security_level === "hardened"
    ? "Apply least-privilege and input validation practices."
    : null,
  (c) => c.include_error_handling
    ? "Wrap risky operations in try/catch with meaningful error messages."
    : null,
  (c) => {
    switch (c.logging_level) {
      case "basic": return "Log the start and end of the run and any failure.";
      case "detailed": return "Log each major step with timestamps.";
      default: return null;
    }
  },
];

function validate(config: GenerationConfig): GenerationConfig {
  const result = GenerationConfigSchema.safeParse(config);
  if (!result.success) {
    throw InvalidConfigError.fromZod(result.error);
  }
  return result.data;
}

/** Clauses derived from the config's non-default fields, in prompt order. */
export function constraintClauses(config: GenerationConfig): string[] {
  const clauses: string[] = [];
  for (const rule of CLAUSE_TABLE) {
    const clause = rule(config);
    if (clause !== null) clauses.push(clause);
  }
  return clauses;
}

export function compile(config: GenerationConfig): string {
  const valid = validate(config);

  const preamble = `${PREAMBLE}\nTarget environment: PowerShell ${valid.powershell_version} on ${valid.target_os}.`;
  const task = `Task:\n${applyPreset(valid.task_description, valid.prompt_preset)}`;
  const constraints = [...BASELINE_RULES, ...constraintClauses(valid)]
    .map((line) => `- ${line}`)
    .join("\n");

  return [preamble, task, `Constraints:\n${constraints}`, OUTPUT_DIRECTIVE].join("\n\n");
}
