import chalk from 'chalk';
import type { StreamEvent, TerminalEvent } from '../../domain/generation/stream-event.js';

export interface EventOutput {
  write(text: string): void;
}

function describeArguments(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args);
}

/**
 * Writes a turn's events to a terminal. Returns the terminal event, or null
 * if the stream ended without one.
 */
export async function renderEvents(
  events: AsyncIterable<StreamEvent>,
  output: EventOutput,
  onFirstEvent?: () => void
): Promise<TerminalEvent | null> {
  let first = true;

  for await (const event of events) {
    if (first) {
      first = false;
      onFirstEvent?.();
    }

    switch (event.type) {
      case 'token_delta':
        output.write(event.text);
        break;
      case 'tool_call_requested':
        output.write(chalk.dim(`\n[tool] ${event.request.name} ${describeArguments(event.request.arguments)}\n`));
        break;
      case 'content_filtered':
        output.write(chalk.yellow(`\n[filtered: ${event.reason}]\n`));
        break;
      case 'completed': {
        output.write('\n');
        if (event.citations.length > 0) {
          output.write(chalk.gray('\nSources:\n'));
          for (const citation of event.citations) {
            output.write(chalk.gray(`  [${citation.marker}] ${citation.source}\n`));
          }
        }
        if (event.toolsUsed.length > 0) {
          output.write(chalk.gray(`Tools used: ${event.toolsUsed.join(', ')}\n`));
        }
        return event;
      }
      case 'failed':
        output.write(chalk.red(`\n✗ ${event.kind}: ${event.message}\n`));
        return event;
    }
  }

  return null;
}
