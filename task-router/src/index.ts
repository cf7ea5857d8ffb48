#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createDaemon, createRegistry, describeProviders } from './daemon.js';
import { loadConfig, getConfigHelp } from './config/index.js';
import { formatError, wrapError } from './utils/errors.js';
import { logger } from './utils/logger.js';

interface CommonOptions {
  config?: string;
  verbose?: boolean;
  json?: boolean;
}

interface RunOptions extends CommonOptions {
  task?: string[];
}

interface ConfigOptions {
  config?: string;
  validate?: boolean;
}

const program = new Command();

function formatExamples(examples: string[]): string {
  return '\n\nExamples:\n' + examples.map((ex) => `  $ ${ex}`).join('\n');
}

function formatAdditionalInfo(info: string): string {
  return '\n\n' + info;
}

function fail(message: string, error: unknown): never {
  const structured = wrapError(error);
  logger.error(message);
  console.error(formatError(structured));
  process.exit(1);
}

program
  .name('task-router')
  .description(
    'Route coding tasks to interchangeable execution providers.\n\n' +
    'Providers are ranked by live availability, observed success rate and\n' +
    'queue load. A provider that fails (rate limit, outage, timeout) is\n' +
    'replaced by another one within the same dispatch cycle.\n\n' +
    'Quick Start:\n' +
    '  1. Describe your providers in providers.json\n' +
    '  2. Point QUEUE_API_URL at the task queue service\n' +
    '  3. Run "task-router providers" to check availability\n' +
    '  4. Run "task-router start" to begin routing'
  )
  .version('0.1.0');

// Start command - run continuous daemon
program
  .command('start')
  .description(
    'Start the router in continuous mode.\n\n' +
    'Each cycle refreshes queue telemetry, pulls dispatchable tasks and\n' +
    'routes them through the provider pool.' +
    formatExamples([
      'task-router start',
      'task-router start --verbose',
      'task-router start --config ./router.json',
    ]) +
    formatAdditionalInfo(
      'Signals:\n' +
      '  SIGINT (Ctrl+C)      Cancel in-flight tasks and stop\n' +
      '  SIGTERM              Cancel in-flight tasks and stop\n' +
      '  SIGHUP               Reload the providers file'
    )
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('-v, --verbose', 'Enable verbose/debug logging output')
  .option('--json', 'Emit logs as JSON lines')
  .action(async (options: CommonOptions) => {
    try {
      const daemon = createDaemon({
        configPath: options.config,
        verbose: options.verbose,
        logFormat: options.json ? 'json' : undefined,
      });
      await daemon.start();
    } catch (error) {
      fail('Router failed', error);
    }
  });

// Run command - drain the backlog once
program
  .command('run')
  .description(
    'Drain the current backlog and exit.\n\n' +
    'Pulls tasks until the source has none left. With --task, the given\n' +
    'packet files are routed instead of pulling from the queue.' +
    formatExamples([
      'task-router run',
      'task-router run --task ./tasks/fix-login.json',
      'task-router run --task a.json b.json -v',
    ]) +
    formatAdditionalInfo(
      'Exit Codes:\n' +
      '  0  Every task was routed\n' +
      '  1  A task could not be routed or the run failed'
    )
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('-v, --verbose', 'Enable verbose/debug logging output')
  .option('--json', 'Emit logs as JSON lines')
  .option('-t, --task <files...>', 'Task packet files to route instead of pulling from the queue')
  .action(async (options: RunOptions) => {
    try {
      const daemon = createDaemon({
        configPath: options.config,
        verbose: options.verbose,
        logFormat: options.json ? 'json' : undefined,
        taskFiles: options.task,
        runOnce: true,
      });
      const history = await daemon.start();
      const unrouted = history.reduce((sum, cycle) => sum + cycle.exhausted + cycle.errored, 0);
      if (unrouted > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail('Run failed', error);
    }
  });

// Providers command - list descriptors with live availability
program
  .command('providers')
  .description(
    'List configured providers with their effective priority and current\n' +
    'availability. Every enabled provider is probed once.' +
    formatExamples(['task-router providers', 'task-router providers -c ./router.json'])
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .action(async (options: ConfigOptions) => {
    try {
      const config = loadConfig(options.config);
      const entries = await describeProviders(createRegistry(config));

      logger.header('Providers');
      for (const entry of entries) {
        const { descriptor } = entry;
        const status = !descriptor.enabled
          ? chalk.gray('disabled')
          : entry.stats.available
            ? chalk.green('✓ available')
            : chalk.red('✗ unavailable');
        console.log(chalk.bold(descriptor.name));
        console.log(`  Adapter:     ${descriptor.adapter} (${descriptor.type})`);
        console.log(`  Priority:    ${descriptor.priority} (effective ${entry.effectivePriority})`);
        console.log(`  Rate limits: ${descriptor.rateLimitStrategy}`);
        console.log(`  Confidence:  ${descriptor.confidenceWeight}`);
        console.log(`  Status:      ${status}`);
        console.log();
      }
    } catch (error) {
      fail('Failed to list providers', error);
    }
  });

// Config command - show/validate config
program
  .command('config')
  .description(
    'Show or validate configuration.\n\n' +
    'Configuration precedence (highest to lowest):\n' +
    '  1. Environment variables\n' +
    '  2. Config file\n' +
    '  3. Default values' +
    formatExamples([
      'task-router config',
      'task-router config --validate',
      'task-router config -c ./router.json',
    ]) +
    formatAdditionalInfo(
      'Config File Locations (searched in order):\n' +
      '  • ./task-router.config.json\n' +
      '  • ./.task-router.json'
    )
  )
  .option('-c, --config <path>', 'Path to configuration file (JSON format)')
  .option('--validate', 'Only validate configuration, do not show details')
  .action((options: ConfigOptions) => {
    try {
      const config = loadConfig(options.config);

      if (options.validate) {
        logger.success('Configuration is valid');
        return;
      }

      logger.header('Configuration');

      console.log(chalk.bold('Providers:'));
      console.log(`  File:        ${config.providersFile}`);
      console.log();

      console.log(chalk.bold('Routing:'));
      console.log(`  High Load:   queued > ${config.routing.highLoadThreshold}`);
      console.log(`  Floor:       ${config.routing.successRateFloor} after ${config.routing.minObservedRuns} runs`);
      console.log(`  Nudges:      -${config.routing.demoteDelta} / +${config.routing.promoteDelta} for ${config.routing.nudgeTtlMs}ms`);
      console.log(`  Window:      ${config.routing.statsWindow} outcomes`);
      console.log(`  Cooldown:    ${config.routing.rateLimitCooldownMs}ms`);
      console.log(`  Attempts:    ${config.routing.defaultMaxAttempts}`);
      console.log();

      console.log(chalk.bold('Telemetry:'));
      console.log(`  Queue URL:   ${config.telemetry.queueUrl ?? chalk.gray('not set')}`);
      console.log(`  Poll:        ${config.telemetry.pollIntervalMs}ms`);
      console.log(`  Timeout:     ${config.telemetry.requestTimeoutMs}ms`);
      console.log();

      console.log(chalk.bold('Daemon:'));
      console.log(`  Interval:    ${config.daemon.loopIntervalMs}ms`);
      console.log(`  Concurrency: ${config.daemon.maxConcurrentTasks}`);
      console.log(`  Work Dir:    ${config.daemon.workDir}`);
      console.log();

      console.log(chalk.bold('Logging:'));
      console.log(`  Level:       ${config.logging.level}`);
      console.log(`  Format:      ${config.logging.format}`);
    } catch (error) {
      fail('Configuration error', error);
    }
  });

// Help command - show detailed help for configuration
program
  .command('help-config')
  .description('Show detailed help for configuration options and environment variables.')
  .action(() => {
    console.log();
    logger.header('Configuration Reference');
    console.log();
    console.log(getConfigHelp());
  });

program.parse();
