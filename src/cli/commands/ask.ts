import { randomUUID } from 'node:crypto';
import ora from 'ora';
import { loadRuntimeConfig, resolveSecrets } from '../../infra/config/index.js';
import { createAssistant } from '../../app/create-assistant.js';
import { renderEvents } from '../lib/render-events.js';

interface AskOptions {
  debug?: boolean;
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  const config = loadRuntimeConfig();
  if (options.debug) {
    config.debug.loggingEnabled = true;
  }

  const { orchestrator } = createAssistant(config, resolveSecrets());
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = ora('Searching the knowledge base...').start();
  const stopSpinner = (): void => {
    if (spinner.isSpinning) spinner.stop();
  };

  try {
    const events = orchestrator.submitTurn(randomUUID(), question, {
      signal: controller.signal,
      onStateChange: (event) => {
        if (event.from === 'retrieving') stopSpinner();
      },
    });

    const terminal = await renderEvents(events, { write: (text) => process.stdout.write(text) }, stopSpinner);
    if (!terminal || terminal.type === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    stopSpinner();
    process.removeListener('SIGINT', onInterrupt);
  }
}
