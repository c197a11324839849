// Path: src/cli/index.ts
// pollgate command line: wait for files and processes from the shell

import { Command } from 'commander';
import type { Logger } from 'pino';
import type { CompletionGate } from '../completion-gate.js';
import { EXIT_CODES, VERSION } from '../constants.js';
import { DeadlineExceededError } from '../errors.js';
import { loadGateConfig, type GateConfig } from '../gate-config.js';
import { FileGate } from '../gates/file-gate.js';
import { ProcessExitGate } from '../gates/process-gate.js';
import { createLogger } from '../logger.js';
import { getErrorMessage } from '../utils/error.js';
import { parsePid, parseSeconds } from './constants.js';
import { colorize, formatDuration, formatTimeout } from './formatters.js';

/**
 * Where the CLI writes its results
 */
export interface CLIOutput {
  success(message: string): void;
  error(message: string): void;
  info(message: string): void;
}

export interface CLIContext {
  output: CLIOutput;
  /** Records the process exit code */
  setExitCode(code: number): void;
  /** Logger for gates (default: created from configuration) */
  logger?: Logger;
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

interface WaitCommandOptions {
  timeout?: number;
  interval?: number;
  verbose?: boolean;
}

interface FileCommandOptions extends WaitCommandOptions {
  absent?: boolean;
}

/**
 * Context writing to the console and process.exitCode
 */
export function createConsoleContext(plain = !process.stdout.isTTY): CLIContext {
  return {
    output: {
      success: message => console.log(colorize(`✓ ${message}`, 'green', plain)),
      error: message => console.error(colorize(`✗ ${message}`, 'red', plain)),
      info: message => console.log(colorize(message, 'dim', plain)),
    },
    setExitCode: code => {
      process.exitCode = code;
    },
  };
}

function addWaitOptions(command: Command): Command {
  return command
    .option('-t, --timeout <seconds>', 'give up after this many seconds', parseSeconds)
    .option('-i, --interval <seconds>', 'delay between checks', parseSeconds)
    .option('-v, --verbose', 'enable debug logging');
}

/**
 * Wait on a gate and report the outcome through the context
 */
async function runGate(
  ctx: CLIContext,
  config: GateConfig,
  gate: CompletionGate,
  options: WaitCommandOptions
): Promise<void> {
  const timeoutSeconds = options.timeout ?? config.timeoutSeconds;
  const started = Date.now();
  let polls = 0;

  gate
    .during(() => {
      polls++;
    })
    .onTimeout(() => {
      ctx.output.info(`Gave up after ${polls} poll${polls === 1 ? '' : 's'}`);
    });

  ctx.output.info(`Waiting for ${gate.describe()} (${formatTimeout(timeoutSeconds)})`);

  try {
    await gate.wait(timeoutSeconds, { sleepSeconds: options.interval ?? config.sleepSeconds });
    ctx.output.success(
      `${gate.describe()} finished after ${polls} poll${polls === 1 ? '' : 's'} (${formatDuration(Date.now() - started)})`
    );
    ctx.setExitCode(EXIT_CODES.SUCCESS);
  } catch (err) {
    if (err instanceof DeadlineExceededError) {
      ctx.output.error(err.message);
      ctx.setExitCode(EXIT_CODES.TIMEOUT);
      return;
    }
    ctx.output.error(`Wait failed: ${getErrorMessage(err)}`);
    ctx.setExitCode(EXIT_CODES.FAILURE);
  }
}

/**
 * Build the pollgate program
 */
export function createProgram(ctx: CLIContext = createConsoleContext()): Command {
  const program = new Command();

  program
    .name('pollgate')
    .description('Wait for conditions by polling')
    .version(VERSION);

  /**
   * Resolve configuration and the gate logger, reporting bad configuration
   * as a failure
   */
  const prepare = (options: WaitCommandOptions): { config: GateConfig; logger: Logger } | null => {
    try {
      const config = loadGateConfig(ctx.env ?? process.env);
      const logger = ctx.logger ?? createLogger({ level: options.verbose ? 'debug' : config.logLevel });
      return { config, logger };
    } catch (err) {
      ctx.output.error(`Invalid configuration: ${getErrorMessage(err)}`);
      ctx.setExitCode(EXIT_CODES.FAILURE);
      return null;
    }
  };

  addWaitOptions(
    program
      .command('file <path>')
      .description('Wait for a file or directory to exist')
      .option('--absent', 'wait for the path to be removed instead')
  ).action(async (path: string, options: FileCommandOptions) => {
    const prepared = prepare(options);
    if (!prepared) {
      return;
    }
    const gate = new FileGate(path, { absent: options.absent ?? false, logger: prepared.logger });
    await runGate(ctx, prepared.config, gate, options);
  });

  addWaitOptions(
    program
      .command('pid')
      .description('Wait for a process to exit')
      .argument('<pid>', 'process id', parsePid)
  ).action(async (pid: number, options: WaitCommandOptions) => {
    const prepared = prepare(options);
    if (!prepared) {
      return;
    }
    const gate = new ProcessExitGate(pid, { logger: prepared.logger });
    await runGate(ctx, prepared.config, gate, options);
  });

  return program;
}
