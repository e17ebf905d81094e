import pc from 'picocolors';
import { resolve } from 'path';
import type { AppContext } from '../context.js';
import { InvalidConfigError, ModelCallError } from '../errors.js';
import { parseGenerationConfig } from '../generation/schema.js';
import { writeScript } from '../script.js';
import { parseGenerateArgs } from './args.js';

export type Writer = (text: string) => void;

export const EXIT_OK = 0;
export const EXIT_MODEL_ERROR = 1;
export const EXIT_INVALID_INPUT = 2;

const stdoutWriter: Writer = (text) => {
  process.stdout.write(text);
};

const stderrWriter: Writer = (text) => {
  process.stderr.write(text);
};

export function reportInvalid(err: InvalidConfigError, errOut: Writer = stderrWriter): number {
  errOut(`${pc.red('Invalid input:')}\n`);
  for (const issue of err.issues) {
    errOut(`  ${pc.bold(issue.path)}: ${issue.message}\n`);
  }
  return EXIT_INVALID_INPUT;
}

export function reportModelError(err: ModelCallError, errOut: Writer = stderrWriter): number {
  errOut(`${pc.red(`Model error (${err.kind}):`)} ${err.message}\n`);
  return EXIT_MODEL_ERROR;
}

/** `prompt`: print the compiled instruction without calling the model. */
export function runPrompt(args: string[], ctx: AppContext, out: Writer = stdoutWriter, errOut: Writer = stderrWriter): number {
  try {
    const { input } = parseGenerateArgs(args);
    const config = parseGenerationConfig({ ...ctx.config.defaults, ...input });
    out(ctx.generator.preview(config) + '\n');
    return EXIT_OK;
  } catch (err) {
    if (err instanceof InvalidConfigError) return reportInvalid(err, errOut);
    throw err;
  }
}

/** `generate`: compile, call the model, then write or print the script. */
export async function runGenerate(
  args: string[],
  ctx: AppContext,
  out: Writer = stdoutWriter,
  errOut: Writer = stderrWriter
): Promise<number> {
  try {
    const options = parseGenerateArgs(args);
    const config = parseGenerationConfig({ ...ctx.config.defaults, ...options.input });
    const result = await ctx.generator.generate(config);

    if (options.stdout) {
      out(result.script.content + '\n');
      return EXIT_OK;
    }

    const dir = options.outDir ? resolve(options.outDir) : ctx.config.outputDir;
    const path = await writeScript(dir, result.script);
    out(`${pc.green('Saved')} ${path}\n`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof InvalidConfigError) return reportInvalid(err, errOut);
    if (err instanceof ModelCallError) return reportModelError(err, errOut);
    throw err;
  }
}
