/**
 * Tests for the CLI program.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/core/session/loader.js', () => ({
  openSession: vi.fn(),
}));

import { createCli } from '../../../src/cli/index.js';
import { openSession } from '../../../src/core/session/loader.js';
import { getPackageVersion } from '../../../src/utils/file-system.js';
import { testSession } from './commands/session-fixture.js';

describe('createCli', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(openSession).mockResolvedValue(testSession());
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should register the reading commands', () => {
    const program = createCli();

    expect(program.name()).toBe('iching');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['cast', 'interpret']);
    expect(program.version()).toBe(getPackageVersion());
  });

  it('should cast when no command is named', async () => {
    await createCli().parseAsync(['node', 'iching', '-l', '7,7,7,7,7,7', '-f', 'numbers']);

    expect(consoleLogSpy).toHaveBeenCalledWith('[7, 7, 7, 7, 7, 7]');
  });

  it('should route to interpret', async () => {
    await createCli().parseAsync(['node', 'iching', 'interpret', '2', '-f', 'numbers']);

    expect(consoleLogSpy).toHaveBeenCalledWith('[8, 8, 8, 8, 8, 8]');
  });
});
