import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../../../src/errors.js';
import { EXIT_TIMEOUT, exitCodeFor } from '../../../src/cli/common/errors.js';
import { createTestClient, FakeSender, screenSequence, surface, surfacesData } from '../../support/fakes.js';

const mocks = vi.hoisted(() => ({
  createCliClient: vi.fn(),
}));

vi.mock('../../../src/cli/common/client.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/cli/common/client.js')>();
  return { ...actual, createCliClient: mocks.createCliClient };
});

import { waitCommand } from '../../../src/cli/commands/wait.js';

describe('waitCommand', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let sender: FakeSender;

  beforeEach(() => {
    sender = new FakeSender().on('list_surfaces', () => surfacesData(surface('s1')));
    mocks.createCliClient.mockReset();
    mocks.createCliClient.mockImplementation(() => createTestClient(sender));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('requires exactly one condition', async () => {
    await expect(waitCommand('s1', {})).rejects.toThrow('Specify exactly one of --text, --regex, --prompt or --idle');
    await expect(waitCommand('s1', { text: 'a', prompt: true })).rejects.toThrow('Specify exactly one');
    expect(mocks.createCliClient).not.toHaveBeenCalled();
  });

  it('waits for text', async () => {
    screenSequence(sender, ['building', 'building\ndone']);

    await waitCommand('s1', { text: 'done' });

    expect(String(logSpy.mock.calls[0][0])).toContain('Found "done"');
  });

  it('prints the regex match', async () => {
    screenSequence(sender, ['node v20.11.1']);

    await waitCommand('s1', { regex: 'v\\d+\\.\\d+' });

    expect(String(logSpy.mock.calls[0][0])).toContain('Matched "v20.11"');
  });

  it('waits for a prompt', async () => {
    screenSequence(sender, ['~ $ ']);
    await waitCommand('s1', { prompt: true });
    expect(String(logSpy.mock.calls[0][0])).toContain('Prompt is visible');
  });

  it('waits for an idle screen', async () => {
    screenSequence(sender, ['static']);
    await waitCommand('s1', { idle: true, stableMs: 200 });
    expect(String(logSpy.mock.calls[0][0])).toContain('Screen is idle');
  });

  it('times out with the wait deadline', async () => {
    screenSequence(sender, ['nothing yet']);

    const error = await waitCommand('s1', { text: 'done', waitTimeout: 300 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ timeoutMs: 300 });
  });

  it('reports a regex timeout as a timeout', async () => {
    screenSequence(sender, ['nothing yet']);

    const error = await waitCommand('s1', { regex: 'do+ne', waitTimeout: 200 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(exitCodeFor(error)).toBe(EXIT_TIMEOUT);
  });
});
