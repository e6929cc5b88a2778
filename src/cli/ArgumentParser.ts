/**
 * ArgumentParser - Command-line parsing for tool-agents
 *
 * Commands:
 *   tool-agents run <task...>          Run the reasoning loop on a task
 *   tool-agents config show [key]      Print the effective configuration
 *   tool-agents config set <key> <v>   Persist a configuration value
 *   tool-agents config reset           Restore the defaults
 */

import { Command, InvalidArgumentError } from 'commander';
import { MCP_CLIENT_INFO } from '../config/constants.js';

export interface RunCommandOptions {
  model?: string;
  endpoint?: string;
  temperature?: number;
  maxIterations?: number;
  /** System prompt placed before the task */
  system?: string;
  /** MCP configuration file; defaults to ~/.tool-agents/mcp-config.json */
  mcpConfig?: string;
  /** Configured servers to start for this run */
  server?: string[];
  verbose?: boolean;
  debug?: boolean;
}

export type CLICommand =
  | { kind: 'run'; task: string; options: RunCommandOptions }
  | { kind: 'config-show'; key?: string }
  | { kind: 'config-set'; key: string; value: string }
  | { kind: 'config-reset' };

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

export class ArgumentParser {
  private program: Command;
  private command: CLICommand | null = null;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Exit through exceptions instead of process.exit (for embedding and tests)
   */
  exitOverride(): this {
    this.program.exitOverride();
    this.program.commands.forEach(command => {
      command.exitOverride();
      command.commands.forEach(sub => sub.exitOverride());
    });
    return this;
  }

  private setupCommands(): void {
    this.program
      .name('tool-agents')
      .description('Run an LLM reasoning loop with local and MCP-provided tools')
      .version(MCP_CLIENT_INFO.version);

    this.program
      .command('run')
      .description('Run a task until the model answers or the iteration budget is spent')
      .argument('<task...>', 'Task for the model')
      .option('--model <name>', 'The model to use')
      .option('--endpoint <url>', 'OpenAI-compatible API base URL')
      .option('--temperature <number>', 'Sampling temperature', parseTemperature)
      .option('--max-iterations <n>', 'Maximum number of tool rounds', parsePositiveInteger)
      .option('--system <prompt>', 'System prompt')
      .option('--mcp-config <file>', 'MCP server configuration file')
      .option('--server <name...>', 'Configured MCP servers to start')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--debug', 'Enable debug logging')
      .action((taskWords: string[], options: RunCommandOptions) => {
        this.command = {
          kind: 'run',
          task: taskWords.join(' '),
          options: {
            model: options.model,
            endpoint: options.endpoint,
            temperature: options.temperature,
            maxIterations: options.maxIterations,
            system: options.system,
            mcpConfig: options.mcpConfig,
            server: options.server,
            verbose: options.verbose,
            debug: options.debug,
          },
        };
      });

    const config = this.program.command('config').description('Show or change the configuration');

    config
      .command('show')
      .description('Print the configuration, or one key')
      .argument('[key]', 'Configuration key')
      .action((key: string | undefined) => {
        this.command = { kind: 'config-show', key };
      });

    config
      .command('set')
      .description('Persist a configuration value')
      .argument('<key>', 'Configuration key')
      .argument('<value>', 'Value; JSON literals such as 0.5 or null are parsed')
      .action((key: string, value: string) => {
        this.command = { kind: 'config-set', key, value };
      });

    config
      .command('reset')
      .description('Restore all defaults')
      .action(() => {
        this.command = { kind: 'config-reset' };
      });
  }

  /**
   * Parse command-line arguments
   *
   * @param argv - Process arguments (defaults to process.argv)
   * @returns The selected command, or null when commander printed help
   */
  parse(argv: string[] = process.argv): CLICommand | null {
    this.command = null;
    this.program.parse(argv);
    return this.command;
  }

  /**
   * Get usage information
   */
  getUsage(): string {
    return this.program.helpInformation();
  }
}
