import chalk from 'chalk';
import { loadRuntimeConfig, resolveSecrets } from '../../infra/config/index.js';
import { createAssistant } from '../../app/create-assistant.js';
import { ChatGatewayServer } from '../../gateway/http-server.js';

interface ServeOptions {
  host?: string;
  port?: string;
  debug?: boolean;
}

export function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const config = loadRuntimeConfig();
  if (options.debug) {
    config.debug.loggingEnabled = true;
  }

  const host = options.host ?? config.gateway.host;
  const port = parsePort(options.port, config.gateway.port);

  const assistant = createAssistant(config, resolveSecrets());
  const server = new ChatGatewayServer(
    { orchestrator: assistant.orchestrator, store: assistant.store, services: assistant.services },
    { host, port }
  );

  const boundPort = await server.start();
  const health = server.getHealth();

  console.log(chalk.green(`✓ MedAssist gateway running at http://${host}:${boundPort}`));
  for (const [service, status] of Object.entries(health.services)) {
    const color = status === 'missing' ? chalk.red : status === 'in-memory' ? chalk.yellow : chalk.gray;
    console.log(color(`  ${service}: ${status}`));
  }

  const shutdown = (): void => {
    console.log(chalk.gray('\nShutting down...'));
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red(`✗ Shutdown failed: ${error instanceof Error ? error.message : String(error)}`));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
