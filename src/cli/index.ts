#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { askCommand } from './commands/ask.js';
import { serveCommand } from './commands/serve.js';
import { ConfigValidationError } from '../infra/config/index.js';
import { VERSION } from '../version.js';

function reportError(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(`✗ ${error.message}`));
  } else {
    console.error(chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
}

const program = new Command();

program
  .name('medassist')
  .description('MedAssist - grounded medical information assistant')
  .version(VERSION);

program
  .command('serve')
  .description('Start the HTTP gateway that streams answers as server-sent events')
  .option('-h, --host <host>', 'Host to bind to')
  .option('-p, --port <port>', 'Port to listen on')
  .option('--debug', 'Enable debug logging')
  .action((options) => serveCommand(options).catch(reportError));

program
  .command('ask')
  .description('Ask a single question and stream the answer')
  .argument('<question...>', 'Question to ask')
  .option('--debug', 'Enable debug logging')
  .action((question: string[], options) => askCommand(question.join(' '), options).catch(reportError));

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.yellow('Run `medassist --help` for available commands'));
  process.exit(1);
});

program.parse();
