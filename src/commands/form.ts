import { intro, outro, text, select, confirm, spinner as clackSpinner, note, isCancel, cancel } from '@clack/prompts';
import pc from 'picocolors';
import type { AppContext } from '../context.js';
import { InvalidConfigError, ModelCallError } from '../errors.js';
import { PRESETS } from '../generation/presets.js';
import {
  DETAIL_LEVELS,
  FILE_ENCODINGS,
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
} from '../generation/schema.js';
import type { GenerationResult } from '../generator.js';
import { writeScript } from '../script.js';
import { EXIT_INVALID_INPUT, EXIT_MODEL_ERROR, EXIT_OK, reportInvalid, reportModelError } from './generate.js';

class FormCancelled extends Error {}

function answer<T>(value: T | symbol): T {
  if (isCancel(value)) throw new FormCancelled();
  return value;
}

function choices<T extends string>(values: readonly T[]): { value: T; label: string }[] {
  return values.map((value) => ({ value, label: value }));
}

function numberInRange(min: number, max: number, integer: boolean) {
  return (raw: string): string | undefined => {
    const n = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(n)) return 'Enter a number';
    if (integer && !Number.isInteger(n)) return 'Enter a whole number';
    if (n < min || n > max) return `Enter a value between ${min} and ${max}`;
    return undefined;
  };
}

/**
 * Interactive form: AI settings, prompt settings, PowerShell settings, then
 * the task description.
 */
export async function runForm(ctx: AppContext): Promise<number> {
  const base: Record<string, unknown> = { ...GENERATION_DEFAULTS, ...ctx.config.defaults };
  const initial = parseGenerationConfig({ ...base, task_description: 'placeholder' });

  intro(pc.bgCyan(pc.black(' PWSH-FORGE ')));

  try {
    note('AI settings', 'Step 1/4');
    const model_name = answer(await select({
      message: 'Model',
      options: choices(MODEL_NAMES),
      initialValue: initial.model_name,
    }));
    const temperature = Number(answer(await text({
      message: 'Temperature (0-1)',
      initialValue: String(initial.temperature),
      validate: numberInRange(0, 1, false),
    })));
    const max_tokens = Number(answer(await text({
      message: `Max tokens (1-${MAX_OUTPUT_TOKENS})`,
      initialValue: String(initial.max_tokens),
      validate: numberInRange(1, MAX_OUTPUT_TOKENS, true),
    })));

    note('Prompt settings', 'Step 2/4');
    const prompt_preset = answer(await select({
      message: 'Predefined prompt',
      options: PROMPT_PRESETS.map((value) => ({ value, label: value === 'none' ? 'None' : PRESETS[value].label })),
      initialValue: initial.prompt_preset,
    }));
    const prompt_detail_level = answer(await select({
      message: 'Prompt detail',
      options: choices(DETAIL_LEVELS),
      initialValue: initial.prompt_detail_level,
    }));

    note('PowerShell settings', 'Step 3/4');
    const powershell_version = answer(await select({
      message: 'PowerShell version',
      options: choices(POWERSHELL_VERSIONS),
      initialValue: initial.powershell_version,
    }));
    const target_os = answer(await select({
      message: 'Operating system',
      options: choices(TARGET_OS_OPTIONS),
      initialValue: initial.target_os,
    }));
    const file_encoding = answer(await select({
      message: 'Encoding',
      options: choices(FILE_ENCODINGS),
      initialValue: initial.file_encoding,
    }));
    const include_header = answer(await confirm({ message: 'Add header?', initialValue: initial.include_header }));
    const include_error_handling = answer(await confirm({
      message: 'Add error handling?',
      initialValue: initial.include_error_handling,
    }));
    const logging_level = answer(await select({
      message: 'Logging level',
      options: choices(LOGGING_LEVELS),
      initialValue: initial.logging_level,
    }));
    const verbosity = answer(await select({
      message: 'Verbosity',
      options: choices(VERBOSITY_LEVELS),
      initialValue: initial.verbosity,
    }));
    const script_type = answer(await select({
      message: 'Script type',
      options: choices(SCRIPT_TYPES),
      initialValue: initial.script_type,
    }));
    const security_level = answer(await select({
      message: 'Security level',
      options: choices(SECURITY_LEVELS),
      initialValue: initial.security_level,
    }));

    note('Task', 'Step 4/4');
    const task_description = answer(await text({
      message: 'Describe the PowerShell script',
      placeholder: 'Ex: List all running processes',
      validate: (value) =>
        value.trim() === '' && prompt_preset === 'none' ? 'Please enter a description' : undefined,
    }));

    const config = parseGenerationConfig({
      task_description,
      model_name,
      temperature,
      max_tokens,
      prompt_preset,
      prompt_detail_level,
      powershell_version,
      target_os,
      file_encoding,
      include_header,
      include_error_handling,
      verbosity,
      script_type,
      security_level,
      logging_level,
    });

    const s = clackSpinner();
    s.start('Generating script...');
    let result: GenerationResult;
    try {
      result = await ctx.generator.generate(config);
    } catch (err) {
      s.stop(pc.red('Generation failed'));
      throw err;
    }
    s.stop('Done');

    note(result.script.content, result.script.fileName);

    const save = answer(await confirm({ message: `Save ${result.script.fileName}?`, initialValue: true }));
    if (save) {
      const dir = answer(await text({ message: 'Directory', initialValue: ctx.config.outputDir }));
      const path = await writeScript(dir, result.script);
      outro(`${pc.green('Saved')} ${path}`);
    } else {
      outro('Not saved');
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof FormCancelled) {
      cancel('Cancelled');
      return EXIT_OK;
    }
    if (err instanceof InvalidConfigError) {
      reportInvalid(err);
      return EXIT_INVALID_INPUT;
    }
    if (err instanceof ModelCallError) {
      reportModelError(err);
      return EXIT_MODEL_ERROR;
    }
    throw err;
  }
}
