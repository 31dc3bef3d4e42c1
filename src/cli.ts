#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig, type AppConfig } from './config/index.js';
import { describeError } from './errors.js';
import { createBackend } from './providers/index.js';
import { CompletionClient } from './services/completion-client.js';
import { getCompletion } from './services/completions.js';
import { logger } from './telemetry/logger.js';

export interface CliOptions {
  client: CompletionClient;
  input: Readable;
  output: Writable;
  errorOutput: Writable;
  interactive?: boolean;
  model?: string;
  temperature?: number;
}

async function readLine(input: Readable): Promise<string | undefined> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      return line;
    }
    return undefined;
  } finally {
    rl.close();
  }
}

function errorLabel(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

/**
 * Reads one line, sends it as a single prompt and prints the reply.
 * Resolves to the process exit code.
 */
export async function runCli(options: CliOptions): Promise<number> {
  const { client, input, output, errorOutput } = options;

  if (options.interactive) {
    errorOutput.write('Enter a prompt: ');
  }

  const line = await readLine(input);
  if (line === undefined) {
    errorOutput.write('Error: No input received\n');
    return 1;
  }

  try {
    const reply = await getCompletion(client, line, {
      model: options.model,
      temperature: options.temperature,
    });
    output.write(`${reply}\n`);
    return 0;
  } catch (error) {
    logger.error({ error: describeError(error), errorType: errorLabel(error) }, 'Prompt failed');
    errorOutput.write(`${errorLabel(error)}: ${describeError(error)}\n`);
    return 1;
  }
}

/**
 * npm links `bin` entries, so argv[1] may be a symlink to this module.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    process.stderr.write(`Configuration error: ${describeError(error)}\n`);
    return 1;
  }

  logger.level = config.logLevel;

  const backend = createBackend(config.provider, {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeout: config.requestTimeoutMs,
  });

  return runCli({
    client: new CompletionClient(backend),
    input: process.stdin,
    output: process.stdout,
    errorOutput: process.stderr,
    interactive: process.stdin.isTTY,
    model: config.model,
    temperature: config.temperature,
  });
}

if (isMainModule(import.meta.url, process.argv[1])) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error: describeError(error) }, 'Unexpected failure');
      process.stderr.write(`Error: ${describeError(error)}\n`);
      process.exitCode = 1;
    });
}
