#!/usr/bin/env node
import { parseArgs } from './cli/parser.js';
import { createOutput, Output } from './cli/output.js';
import { getCommand, commands } from './cli/commands/index.js';
import { BOOLEAN_FLAGS, configFromFlags, stringFlag } from './cli/flags.js';
import { loadConfig } from './config/loader.js';
import type { ReposcoreConfig } from './config/schema.js';
import { errorMessage } from './errors.js';
import { createLogger } from './observability/logger.js';
import { VERSION } from './index.js';

// Import commands to register them
import './cli/commands/score.js';
import './cli/commands/calc.js';
import './cli/commands/config.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), { booleans: BOOLEAN_FLAGS });
  const output = createOutput();

  if (args.flags['version'] || args.flags['v']) {
    output.log(`reposcore v${VERSION}`);
    return 0;
  }

  if (args.flags['help'] || args.flags['h'] || !args.command) {
    printHelp(output);
    return 0;
  }

  const cmd = getCommand(args.command);
  if (!cmd) {
    output.error(`Unknown command: ${args.command}`);
    output.log(`Run 'reposcore --help' for usage.`);
    return 1;
  }

  let config: ReposcoreConfig;
  try {
    config = await loadConfig({
      cliFlags: configFromFlags(args.flags),
      configPath: stringFlag(args.flags, 'config'),
    });
  } catch (error) {
    output.error(errorMessage(error));
    return 1;
  }

  createLogger({ level: config.logLevel, json: config.jsonLogs });

  return cmd.run({ args, output, config, cwd: process.cwd() });
}

function printHelp(output: Output): void {
  output.log(`reposcore v${VERSION} - Contribution scores for GitHub repositories`);
  output.log('');
  output.log('Usage: reposcore <command> [options]');
  output.log('');
  output.log('Commands:');
  for (const [name, cmd] of commands) {
    output.log(`  ${name.padEnd(8)} ${cmd.description}`);
    output.log(`           reposcore ${cmd.usage}`);
  }
  output.log('');
  output.log('Global Options:');
  output.log('  --help, -h       Show this help message');
  output.log('  --version, -v    Show version');
  output.log('  --config         Path to config file');
  output.log('  --log-level      Set log level (debug, info, warn, error, silent)');
  output.log('  --json-logs      Write logs as JSON lines');
}

main()
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
