#!/usr/bin/env node

/**
 * recolor - CLI entry
 *
 * Colorizes the capture groups of a regular expression in every line piped
 * through it.
 */

import { Command, CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { Env, RecolorConfig } from './config/RecolorConfig.js';
import { resolveConfig } from './config/RecolorConfig.js';
import type { ILogger } from './interfaces/ILogger.js';
import { isRecolorError } from './models/RecolorError.js';
import { ConsoleLogger } from './outputs/ConsoleLogger.js';
import { colorizeStream } from './services/ColorizeStream.js';
import { resolveGroupStyles } from './services/GroupStyler.js';
import { PaletteCycler } from './services/PaletteCycler.js';
import { compilePattern } from './services/PatternCompiler.js';
import { parseOverrides } from './services/StyleSpecParser.js';
import { VERSION } from './version.js';

const __filename = fileURLToPath(import.meta.url);

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: Env;
}

interface CommandOptions {
  global?: boolean;
  verbose?: boolean;
}

const STYLES_HELP = `
Styles:
  colors      black red green yellow blue magenta cyan white,
              bright_<color> for each of the above, or #rrggbb
  attributes  bold dimmed italic underline blink hidden strikethrough

Examples:
  $ ping example.com | recolor '(\\d+) bytes from ([^:]+)'
  $ tail -f app.log | recolor '(?P<level>ERROR|WARN) (?P<msg>.*)' level=red,bold msg=#ff8800
`;

function createLogger(config: RecolorConfig, io: CliIO): ILogger {
  return new ConsoleLogger({
    colors: config.diagnosticColors,
    level: config.logLevel,
    prefix: 'recolor:',
    stream: io.stderr,
  });
}

/**
 * Build the command for one invocation.
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('recolor')
    .description('Colorize the capture groups of a regular expression in piped command output')
    .version(VERSION)
    .argument('<pattern>', 'regular expression matched against every line; (?<name>...) and (?P<name>...) name a group')
    .argument('[styles...]', 'key=style[,style...] where key is a group name or 1-based group number')
    .option('-g, --global', 'colorize every match in a line, not only the first')
    .option('-v, --verbose', 'log debug information to stderr')
    .addHelpText('after', STYLES_HELP)
    .configureOutput({
      writeOut: str => {
        io.stdout.write(str);
      },
      writeErr: str => {
        io.stderr.write(str);
      },
    })
    .exitOverride()
    .action(async (pattern: string, styles: string[], options: CommandOptions) => {
      const config = resolveConfig(options, io.env);
      const logger = createLogger(config, io);

      // Everything is validated before the first line is read.
      const compiled = compilePattern(pattern, { global: config.global });
      const overrides = parseOverrides(styles);
      logger.debug('pattern compiled', { pattern, groups: compiled.groups.length, global: config.global });

      const groupStyles = resolveGroupStyles(compiled.groups, overrides, new PaletteCycler(), logger);

      await colorizeStream(io.stdin, io.stdout, { pattern: compiled, groupStyles, logger });
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function run(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // commander has already written its own message
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return 0;
      }
      return err.exitCode || 1;
    }
    const logger = createLogger(resolveConfig({}, io.env), io);
    if (isRecolorError(err)) {
      logger.error(err.message);
      return 1;
    }
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function defaultIO(): CliIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}

const invokedAsEntry = (() => {
  const argvPath = process.argv[1];
  if (!argvPath) return false;
  try {
    const resolvedArgv = fs.realpathSync(path.resolve(argvPath));
    const resolvedFile = fs.realpathSync(__filename);
    return resolvedArgv === resolvedFile;
  } catch {
    return false;
  }
})();

if (invokedAsEntry) {
  run(process.argv).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`recolor: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  );
}
