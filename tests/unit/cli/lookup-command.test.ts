/**
 * Unit tests for lookup CLI command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { getFixturePath } from '../../helpers/fixtures.js';

const CONFIG = getFixturePath('configs', 'valid-config.json');

describe('CLI lookup command', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.resetModules();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  function output(): string {
    return logSpy.mock.calls.map(c => String(c[0])).join('\n');
  }

  it('prints the non-empty sections', async () => {
    const { lookupCommand } = await import('../../../src/cli/commands/lookup.js');

    await lookupCommand.parseAsync(['quickly', '-c', CONFIG], { from: 'user' });

    expect(output()).toBe('quickly\n\nSynonyms:\n  rapidly\n  speedily\nExamples:\n  he works quickly');
  });

  it('prints JSON', async () => {
    const { lookupCommand } = await import('../../../src/cli/commands/lookup.js');

    await lookupCommand.parseAsync(['good', '-c', CONFIG, '--json'], { from: 'user' });

    expect(JSON.parse(output())).toEqual({
      word: 'good',
      synonyms: [],
      antonyms: ['bad'],
      related: [],
      examples: [],
    });
  });

  it('reports unknown words', async () => {
    const { lookupCommand } = await import('../../../src/cli/commands/lookup.js');

    await lookupCommand.parseAsync(['zeppelin', '-c', CONFIG], { from: 'user' });

    expect(output()).toBe('No entries found for "zeppelin"');
  });

  it('exits with code 1 when the config is invalid', async () => {
    const configPath = getFixturePath('configs', 'invalid-json.json');
    const { lookupCommand } = await import('../../../src/cli/commands/lookup.js');

    await expect(lookupCommand.parseAsync(['cat', '-c', configPath], { from: 'user' })).rejects.toThrow('process.exit(1)');

    expect(errorSpy).toHaveBeenCalledWith('Error:', `Invalid JSON in config file: ${configPath}`);
  });
});
