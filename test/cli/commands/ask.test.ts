import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { askCommand } from '../../../src/cli/commands/ask.js';
import { GenerationOrchestrator } from '../../../src/app/generation/generation-orchestrator.js';
import type { StreamEvent } from '../../../src/domain/generation/stream-event.js';

describe('askCommand', () => {
  const originalConfigDir = process.env.MEDASSIST_CONFIG_DIR;
  let conversationIds: string[];

  beforeEach(() => {
    process.env.MEDASSIST_CONFIG_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'medassist-ask-'));
    conversationIds = [];
    jest.spyOn(GenerationOrchestrator.prototype, 'submitTurn').mockImplementation(async function* (
      conversationId: string
    ): AsyncGenerator<StreamEvent, void, undefined> {
      conversationIds.push(conversationId);
      yield { type: 'token_delta', text: 'Rest and fluids.' };
      yield { type: 'completed', toolsUsed: [], citations: [], degraded: false };
    });
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    for (const method of ['debug', 'info', 'log', 'warn'] as const) {
      jest.spyOn(console, method).mockImplementation(() => undefined);
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    if (originalConfigDir === undefined) {
      delete process.env.MEDASSIST_CONFIG_DIR;
    } else {
      process.env.MEDASSIST_CONFIG_DIR = originalConfigDir;
    }
  });

  it('should start a fresh conversation for every question', async () => {
    await askCommand('What helps a cold?', {});
    await askCommand('And a fever?', {});

    expect(conversationIds).toHaveLength(2);
    expect(conversationIds[0]).not.toBe(conversationIds[1]);
    expect(process.stdout.write).toHaveBeenCalledWith('Rest and fluids.');
    expect(process.exitCode).toBeUndefined();
  });
});
