import { describe, it, expect } from 'vitest';
import { globalFlag, parseGenerateArgs } from '../src/commands/args.js';
import { InvalidConfigError } from '../src/errors.js';

describe('parseGenerateArgs', () => {
  it('should map flags onto config fields', () => {
    const options = parseGenerateArgs([
      '--task', 'Rotate IIS logs',
      '--model', 'gemini-1.5-flash',
      '--temperature', '0.2',
      '--max-tokens', '4096',
      '--preset', 'list_files',
      '--detail', 'high',
      '--ps-version', '5.1',
      '--os', 'Windows Server 2019',
      '--encoding', 'ansi',
      '--verbosity', 'terse',
      '--script-type', 'interactive',
      '--security', 'hardened',
      '--logging', 'detailed',
      '--header',
      '--error-handling',
    ]);

    expect(options).toEqual({
      stdout: false,
      input: {
        task_description: 'Rotate IIS logs',
        model_name: 'gemini-1.5-flash',
        temperature: 0.2,
        max_tokens: 4096,
        prompt_preset: 'list_files',
        prompt_detail_level: 'high',
        powershell_version: '5.1',
        target_os: 'Windows Server 2019',
        file_encoding: 'ansi',
        verbosity: 'terse',
        script_type: 'interactive',
        security_level: 'hardened',
        logging_level: 'detailed',
        include_header: true,
        include_error_handling: true,
      },
    });
  });

  it('should join bare words into the task description', () => {
    const options = parseGenerateArgs(['Restart', 'the', 'spooler', '--no-header', '--stdout']);

    expect(options.input).toEqual({ task_description: 'Restart the spooler', include_header: false });
    expect(options.stdout).toBe(true);
  });

  it('should prefer --task over bare words', () => {
    expect(parseGenerateArgs(['ignored', '--task', 'Ping gateway']).input.task_description).toBe('Ping gateway');
  });

  it('should treat words like constructor as part of the task', () => {
    expect(parseGenerateArgs(['constructor', 'toString']).input).toEqual({ task_description: 'constructor toString' });
  });

  it('should not read a blank number as zero', () => {
    const { input } = parseGenerateArgs(['--temperature', '', '--max-tokens', '  ']);
    expect(input.temperature).toBeNaN();
    expect(input.max_tokens).toBeNaN();
  });

  it('should keep a flag-like task value', () => {
    expect(parseGenerateArgs(['--task', '-v']).input).toEqual({ task_description: '-v' });
  });

  it('should take an output directory', () => {
    expect(parseGenerateArgs(['--out', 'scripts']).outDir).toBe('scripts');
  });

  it('should reject unknown flags', () => {
    expect(() => parseGenerateArgs(['--colour', 'blue'])).toThrow(new InvalidConfigError('--colour: unknown option'));
  });

  it('should reject a flag without its value', () => {
    try {
      parseGenerateArgs(['--task']);
      expect.unreachable('parseGenerateArgs should have thrown');
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidConfigError);
      if (e instanceof InvalidConfigError) {
        expect(e.issues).toEqual([{ path: '--task', message: 'expects a value' }]);
      }
    }
    expect(() => parseGenerateArgs(['--out'])).toThrow('--out: expects a directory');
  });
});

describe('globalFlag', () => {
  it('should find version and help in the command position', () => {
    expect(globalFlag(['-v'])).toBe('version');
    expect(globalFlag(['--version'])).toBe('version');
    expect(globalFlag(['-h'])).toBe('help');
    expect(globalFlag(['generate', '--help'])).toBe('help');
  });

  it('should ignore the same strings used as flag values', () => {
    expect(globalFlag(['generate', '--task', '-v'])).toBeUndefined();
    expect(globalFlag(['prompt', '--os', 'Windows 10', '-h'])).toBeUndefined();
    expect(globalFlag([])).toBeUndefined();
  });
});
