#!/usr/bin/env node
/**
 * tool-agents CLI Entry Point
 *
 * Parses arguments, loads configuration, and runs the selected command.
 */

import chalk from 'chalk';
import { ArgumentParser } from './cli/ArgumentParser.js';
import type { CLICommand, RunCommandOptions } from './cli/ArgumentParser.js';
import { ConfigManager } from './services/ConfigManager.js';
import { ActivityStream } from './services/ActivityStream.js';
import { logger } from './services/Logger.js';
import { withSession } from './agent/AgentSession.js';
import { ModelClientError } from './llm/ModelClient.js';
import { ActivityEventType } from './types/index.js';
import type { Config } from './types/index.js';
import { formatError } from './utils/errorUtils.js';

const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  BUDGET_EXHAUSTED: 2,
  CANCELLED: 130,
} as const;

/**
 * Parse a config value typed on the command line: JSON literals such as
 * 0.5, true or null are decoded, anything else stays a string
 */
function parseCliValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function applyRunOverrides(config: Readonly<Config>, options: RunCommandOptions): Config {
  return {
    ...config,
    model: options.model ?? config.model,
    endpoint: options.endpoint ?? config.endpoint,
    temperature: options.temperature ?? config.temperature,
    max_iterations: options.maxIterations ?? config.max_iterations,
  };
}

async function handleRun(task: string, options: RunCommandOptions, configManager: ConfigManager): Promise<number> {
  const config = applyRunOverrides(configManager.getConfig(), options);
  const activityStream = new ActivityStream();
  activityStream.subscribe(ActivityEventType.TOOL_CALL_START, event => {
    console.log(chalk.dim(`Called tool ${String(event.data.toolName)}`));
  });
  activityStream.subscribe(ActivityEventType.PROVIDER_CONNECTED, event => {
    logger.verbose(`[CLI] Connected to MCP server '${String(event.data.serverName)}'`);
  });

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const result = await withSession({ config, systemPrompt: options.system, activityStream }, async session => {
      await session.loadProviders(options.mcpConfig);
      for (const name of options.server ?? []) {
        await session.providers.startServer(name);
      }
      await session.providers.startAutoStartServers();
      return session.run(task, { signal: controller.signal });
    });

    switch (result.status) {
      case 'done':
        console.log(result.content ?? '');
        return EXIT_CODES.OK;
      case 'aborted':
        console.error(chalk.yellow(result.content ?? ''));
        return EXIT_CODES.BUDGET_EXHAUSTED;
      case 'cancelled':
        console.error(chalk.yellow('Cancelled.'));
        return EXIT_CODES.CANCELLED;
    }
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function handleConfigCommand(
  command: Exclude<CLICommand, { kind: 'run' }>,
  configManager: ConfigManager
): Promise<number> {
  switch (command.kind) {
    case 'config-show': {
      if (command.key === undefined) {
        console.log(JSON.stringify(configManager.getConfig(), null, 2));
        return EXIT_CODES.OK;
      }
      if (!configManager.hasKey(command.key)) {
        console.error(chalk.red(`Unknown config key: ${command.key}`));
        console.error(`Available keys: ${configManager.getKeys().join(', ')}`);
        return EXIT_CODES.FAILURE;
      }
      const source = configManager.getConfigSource(command.key);
      console.log(`${command.key}: ${JSON.stringify(configManager.getValue(command.key))} ${chalk.dim(`(${source})`)}`);
      return EXIT_CODES.OK;
    }
    case 'config-set': {
      if (!configManager.hasKey(command.key)) {
        console.error(chalk.red(`Unknown config key: ${command.key}`));
        return EXIT_CODES.FAILURE;
      }
      await configManager.setValue(command.key, parseCliValue(command.value));
      console.log(chalk.green(`✓ ${command.key} = ${JSON.stringify(configManager.getValue(command.key))}`));
      return EXIT_CODES.OK;
    }
    case 'config-reset': {
      const changed = await configManager.reset();
      console.log(
        changed.length === 0
          ? 'Configuration is already at default values.'
          : chalk.green(`✓ Configuration reset to defaults (${changed.length} settings changed)`)
      );
      return EXIT_CODES.OK;
    }
  }
}

async function main(): Promise<number> {
  const command = new ArgumentParser().parse(process.argv);
  if (!command) {
    return EXIT_CODES.OK;
  }

  if (command.kind === 'run') {
    logger.configure({ verbose: command.options.verbose, debug: command.options.debug });
  }

  const configManager = new ConfigManager();
  await configManager.initialize();

  try {
    return command.kind === 'run'
      ? await handleRun(command.task, command.options, configManager)
      : await handleConfigCommand(command, configManager);
  } catch (error) {
    console.error(chalk.red(`Error: ${formatError(error)}`));
    if (error instanceof ModelClientError) {
      for (const suggestion of error.suggestions) {
        console.error(chalk.dim(`  - ${suggestion}`));
      }
    }
    logger.debug('[CLI] Failure details:', error);
    return EXIT_CODES.FAILURE;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red(`Fatal error: ${formatError(error)}`));
    process.exitCode = EXIT_CODES.FAILURE;
  }
);
