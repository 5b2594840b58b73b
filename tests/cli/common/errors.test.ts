import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError, ProtocolError, TimeoutError } from '../../../src/errors.js';
import { exitCodeFor, reportCliError, runCliCommand } from '../../../src/cli/common/errors.js';

describe('CLI error handling', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  const errors = () => errorSpy.mock.calls.map((args) => String(args[0]));

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('uses exit code 2 for timeouts and 1 otherwise', () => {
    expect(exitCodeFor(new TimeoutError('slow', 100))).toBe(2);
    expect(exitCodeFor(new ProtocolError('bad'))).toBe(1);
    expect(exitCodeFor('weird')).toBe(1);
  });

  it('prints driver errors without a stack', () => {
    expect(reportCliError(new ProtocolError('Surface not found'))).toBe(1);

    expect(errors()).toHaveLength(1);
    expect(errors()[0]).toContain('Surface not found');
  });

  it('adds a hint when the socket cannot be reached', () => {
    reportCliError(new ConnectionError('Socket not found: /tmp/x.sock', 'missing'));

    expect(errors()).toHaveLength(2);
    expect(errors()[1]).toContain('Is Ghostty running');
  });

  it('prints the stack of unexpected errors', () => {
    reportCliError(new Error('boom'));

    expect(errors()).toHaveLength(2);
    expect(errors()[1]).toContain('Error: boom');
  });

  it('sets the exit code instead of rejecting', async () => {
    await expect(runCliCommand(async () => {
      throw new TimeoutError('Timeout waiting for text: "done"', 300);
    })).resolves.toBeUndefined();
    expect(process.exitCode).toBe(2);
  });

  it('leaves the exit code alone on success', async () => {
    await runCliCommand(async () => {});
    expect(process.exitCode).toBeUndefined();
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
