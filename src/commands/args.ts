import { InvalidConfigError } from '../errors.js';
import type { GenerationInput } from '../generation/schema.js';

export interface GenerateCliOptions {
  input: Record<string, unknown>;
  outDir?: string;
  stdout: boolean;
}

const VALUE_FLAGS: Record<string, { key: keyof GenerationInput; numeric?: boolean }> = {
  '--task': { key: 'task_description' },
  '--model': { key: 'model_name' },
  '--temperature': { key: 'temperature', numeric: true },
  '--max-tokens': { key: 'max_tokens', numeric: true },
  '--preset': { key: 'prompt_preset' },
  '--detail': { key: 'prompt_detail_level' },
  '--ps-version': { key: 'powershell_version' },
  '--os': { key: 'target_os' },
  '--encoding': { key: 'file_encoding' },
  '--verbosity': { key: 'verbosity' },
  '--script-type': { key: 'script_type' },
  '--security': { key: 'security_level' },
  '--logging': { key: 'logging_level' },
};

const BOOLEAN_FLAGS: Record<string, keyof GenerationInput> = {
  '--header': 'include_header',
  '--error-handling': 'include_error_handling',
};

const COMMANDS = ['form', 'generate', 'prompt', 'serve'];

/**
 * `--version`/`--help` as the command, or as the first argument after one
 * (`pwsh-forge generate --help`). Later positions may be flag values.
 */
export function globalFlag(argv: string[]): 'version' | 'help' | undefined {
  const candidate = argv[0] !== undefined && COMMANDS.includes(argv[0]) ? argv[1] : argv[0];
  if (candidate === '--version' || candidate === '-v') return 'version';
  if (candidate === '--help' || candidate === '-h') return 'help';
  return undefined;
}

function usageError(flag: string, message: string): InvalidConfigError {
  return new InvalidConfigError(`${flag}: ${message}`, [{ path: flag, message }]);
}

/**
 * Parse `generate`/`prompt` flags into raw input for parseGenerationConfig.
 * Bare words are joined into the task description when --task is absent.
 */
export function parseGenerateArgs(args: string[]): GenerateCliOptions {
  const input: Record<string, unknown> = {};
  const positional: string[] = [];
  const options: GenerateCliOptions = { input, stdout: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('-')) {
      positional.push(arg);
    } else if (arg === '--stdout') {
      options.stdout = true;
    } else if (arg === '--out') {
      const value = args[i + 1];
      if (value === undefined) throw usageError(arg, 'expects a directory');
      options.outDir = value;
      i++;
    } else if (arg in VALUE_FLAGS) {
      const value = args[i + 1];
      if (value === undefined) throw usageError(arg, 'expects a value');
      const { key, numeric } = VALUE_FLAGS[arg];
      // A blank number must fail validation rather than read as 0.
      input[key] = numeric ? (value.trim() === '' ? Number.NaN : Number(value)) : value;
      i++;
    } else if (arg in BOOLEAN_FLAGS) {
      input[BOOLEAN_FLAGS[arg]] = true;
    } else if (arg.startsWith('--no-') && `--${arg.slice(5)}` in BOOLEAN_FLAGS) {
      input[BOOLEAN_FLAGS[`--${arg.slice(5)}`]] = false;
    } else {
      throw usageError(arg, 'unknown option');
    }
  }

  if (input.task_description === undefined && positional.length > 0) {
    input.task_description = positional.join(' ');
  }

  return options;
}
