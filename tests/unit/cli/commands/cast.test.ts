/**
 * Tests for the cast command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

vi.mock('../../../../src/core/session/loader.js', () => ({
  openSession: vi.fn(),
}));

vi.mock('../../../../src/utils/logger.js', () => {
  const log = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

import { createCastCommand } from '../../../../src/cli/commands/cast.js';
import { openSession } from '../../../../src/core/session/loader.js';
import { logger } from '../../../../src/utils/logger.js';
import { testSession } from './session-fixture.js';

describe('cast command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let processCwdSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(openSession).mockResolvedValue(testSession());
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue('/project');
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    processCwdSpy.mockRestore();
  });

  describe('createCastCommand', () => {
    it('should create a command with correct name', () => {
      expect(createCastCommand().name()).toBe('cast');
    });

    it('should have the reading options', () => {
      const optionNames = createCastCommand().options.map((opt) => opt.long);
      expect(optionNames).toEqual(['--lines', '--question', '--format', '--config']);
    });

    it('should default the config path', () => {
      const configOption = createCastCommand().options.find((opt) => opt.long === '--config');
      expect(configOption?.defaultValue).toBe('.iching/config.yaml');
    });
  });

  describe('runCast', () => {
    it('should load the session from the working directory', async () => {
      await createCastCommand().parseAsync(['-l', '7,8,9,6,7,8'], { from: 'user' });

      expect(openSession).toHaveBeenCalledWith('/project', '.iching/config.yaml');
    });

    it('should build a reading from explicit lines', async () => {
      await createCastCommand().parseAsync(['-l', '7,8,9,6,7,8', '-f', 'numbers'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith('[7, 8, 9, 6, 7, 8]');
    });

    it('should cast coins when no lines are given', async () => {
      await createCastCommand().parseAsync(['--format', 'brief'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith('䷀ 1 Unknown → ䷁ 2 Unknown (lines: 1, 2, 3, 4, 5, 6)');
    });

    it('should record the question', async () => {
      await createCastCommand().parseAsync(['-l', '7,7,7,7,7,7', '-q', 'Test question', '-f', 'brief'], {
        from: 'user',
      });

      expect(consoleLogSpy).toHaveBeenCalledWith('Q: Test question\n䷀ 1 Unknown');
    });

    it('should use the configured format when none is given', async () => {
      vi.mocked(openSession).mockResolvedValue(testSession('motd'));

      await createCastCommand().parseAsync(['-l', '7,8,9,6,7,8'], { from: 'user' });

      expect(consoleLogSpy).toHaveBeenCalledWith('䷾→䷐ 63 TEST AFTER CHANGING INTO 17 TEST FOLLOWING');
    });

    it('should log invalid lines and exit with code 1', async () => {
      await expect(
        createCastCommand().parseAsync(['-l', '7,8,5,6,7,8'], { from: 'user' })
      ).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith('Invalid line value 5 at line 3. Must be 6, 7, 8, or 9');
      expect(processExitSpy).toHaveBeenCalledWith(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should reject unknown formats', async () => {
      const command = createCastCommand()
        .exitOverride()
        .configureOutput({ writeErr: () => {} });

      await expect(command.parseAsync(['-f', 'fancy'], { from: 'user' })).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
      expect(openSession).not.toHaveBeenCalled();
    });
  });
});
