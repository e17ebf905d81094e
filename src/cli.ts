#!/usr/bin/env node
/**
 * pwsh-forge - generate PowerShell scripts from a parameter form.
 */
import 'dotenv/config';
import pc from 'picocolors';
import { createContext } from './context.js';
import { InvalidConfigError } from './errors.js';
import { globalFlag } from './commands/args.js';
import { runForm } from './commands/form.js';
import { EXIT_INVALID_INPUT, reportInvalid, runGenerate, runPrompt } from './commands/generate.js';
import { runServe } from './commands/serve.js';

const VERSION = '0.1.0';

function printHelp() {
  console.log(`
  ${pc.bgCyan(pc.black(' PWSH-FORGE '))} ${pc.dim(`v${VERSION}`)}

  ${pc.bold('Usage:')}
    pwsh-forge                     Interactive form
    pwsh-forge generate [options]  Generate a script and save it
    pwsh-forge prompt [options]    Print the compiled prompt only
    pwsh-forge serve [--port n]    Start the web form

  ${pc.bold('Options:')}
    --task <text>          What the script should do
    --model <name>         gemini-2.0-flash-exp | gemini-1.5-flash | gemini-1.5-pro
    --temperature <0-1>    Sampling temperature
    --max-tokens <n>       Response token limit (max 8192)
    --preset <id>          none | list_files | manage_processes | manage_services
    --detail <level>       low | medium | high
    --ps-version <v>       7 | 5.1
    --os <name>            e.g. "Windows Server 2019"
    --encoding <enc>       utf-8 | ascii | ansi
    --header               Ask for a help header and stamp the file
    --error-handling       Ask for try/catch error handling
    --verbosity <level>    terse | normal | verbose
    --script-type <type>   interactive | unattended
    --security <level>     standard | hardened
    --logging <level>      none | basic | detailed
    --out <dir>            Where to save the .ps1
    --stdout               Print the script instead of saving it
    --version, -v          Show version
    --help, -h             Show help

  ${pc.bold('Examples:')}
    pwsh-forge generate --task "create 50 AD users from a CSV" --security hardened --error-handling
    pwsh-forge prompt --preset manage_services --logging detailed
  `);
}

// Resolves undefined while a server keeps the process alive.
export async function main(argv: string[]): Promise<number | undefined> {
  const flag = globalFlag(argv);
  if (flag === 'version') {
    console.log(`pwsh-forge v${VERSION}`);
    return 0;
  }
  if (flag === 'help') {
    printHelp();
    return 0;
  }

  const [command, ...rest] = argv;
  const ctx = await createContext();

  try {
    switch (command) {
      case undefined:
      case 'form':
        if (!process.stdin.isTTY) {
          console.error('The interactive form needs a terminal. Use `pwsh-forge generate --task ...` instead.');
          return EXIT_INVALID_INPUT;
        }
        return await runForm(ctx);
      case 'generate':
        return await runGenerate(rest, ctx);
      case 'prompt':
        return runPrompt(rest, ctx);
      case 'serve':
        await runServe(rest, ctx);
        return undefined;
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return EXIT_INVALID_INPUT;
    }
  } catch (err) {
    if (err instanceof InvalidConfigError) return reportInvalid(err);
    throw err;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== undefined) process.exitCode = code;
  },
  (err: unknown) => {
    console.error(pc.red('Fatal:'), err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
