#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import { ConfigResolver } from './config/resolver.js';
import { ConfigError, describeError } from './errors.js';
import { createRuntime, setupGracefulShutdown } from './runtime.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/guards.js';

dotenv.config();

const VERSION = '0.1.0';

/** Exit codes: answered (possibly degraded), every subtask failed, bad configuration */
const EXIT_OK = 0;
const EXIT_ALL_FAILED = 1;
const EXIT_CONFIG = 2;

interface RunCommandOptions {
  config: string;
  agents?: number;
  verbose?: boolean;
}

interface ConfigCommandOptions {
  config: string;
}

function parseAgentCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function failureExitCode(error: unknown): number {
  if (error instanceof ConfigError) {
    console.error(error.message);
    return EXIT_CONFIG;
  }
  console.error(`Run failed: ${errorMessage(error)}`);
  return EXIT_ALL_FAILED;
}

const program = new Command();

program
  .name('manifold')
  .description('Fan a task out to several AI workers and merge their answers')
  .version(VERSION);

program
  .command('run')
  .description('Answer a task with parallel workers')
  .argument('<task...>', 'Task to answer')
  .option('-c, --config <path>', 'Configuration file', 'config.yaml')
  .option('-n, --agents <count>', 'Number of parallel agents (overrides orchestrator.parallel_agents)', parseAgentCount)
  .option('-v, --verbose', 'Enable debug logging')
  .action(async (words: string[], options: RunCommandOptions) => {
    const logger = createLogger({ level: options.verbose ? 'debug' : 'info' });
    let exitCode = EXIT_OK;

    try {
      const runtime = await createRuntime({
        source: options.config,
        logger,
        onProgress: (agentId, status) => logger.debug({ agentId, status }, 'Progress'),
      });
      if (!options.verbose) {
        logger.level = runtime.configuration.data.logging.level;
      }
      setupGracefulShutdown(runtime, logger);

      try {
        const answer = await runtime.orchestrator.run(words.join(' '), {
          ...(options.agents !== undefined && { numAgents: options.agents }),
        });
        console.log(answer.text);
        if (!answer.ok) {
          logger.error({ failures: answer.failures.map((f) => f.error) }, 'No subtask succeeded');
          exitCode = EXIT_ALL_FAILED;
        }
      } finally {
        await runtime.pool.shutdown();
      }
    } catch (error) {
      logger.debug({ error: describeError(error) }, 'Run aborted');
      exitCode = failureExitCode(error);
    }

    process.exit(exitCode);
  });

program
  .command('config')
  .description('Show the validated configuration with credentials redacted')
  .option('-c, --config <path>', 'Configuration file', 'config.yaml')
  .action(async (options: ConfigCommandOptions) => {
    const logger = createLogger({ level: 'warn' });
    try {
      const resolver = new ConfigResolver({ logger });
      const configuration = await resolver.load(options.config);
      const sanitized = resolver.sanitize(configuration);
      console.log(`# ${sanitized.source} (generation ${sanitized.generation})`);
      console.log(yaml.dump(sanitized.data, { lineWidth: 120 }).trimEnd());
    } catch (error) {
      process.exit(failureExitCode(error));
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(EXIT_ALL_FAILED);
});
