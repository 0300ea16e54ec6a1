import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loadConfig, getDefaultConfig, findConfig, loadConfigOrDefault } from '../../../src/config/loader.js';
import {
  INVALID_SCHEMA_CONFIG,
  MINIMAL_CONFIG,
  VALID_CONFIG,
  createTempProject,
  getFixturePath,
} from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should load and parse a valid config file', async () => {
      const configPath = getFixturePath('configs', 'valid-config.json');
      const config = await loadConfig(configPath);

      expect(config.lexicon).toEqual({ source: 'json', path: 'tests/fixtures/lexicon/basic.json' });
      expect(config.paraphrase).toEqual({
        numVariations: 3,
        style: 'formal',
        lengthPreference: 'shorter',
        antiDetection: true,
        maxSynonyms: 8,
        seed: 42,
      });
      expect(config.thresholds.fallbackWordChange).toBe(0.6);
      expect(config.bulk).toEqual({ maxParagraphs: 10, numVariations: 3 });
    });

    it('should apply defaults for missing optional fields', async () => {
      const configPath = getFixturePath('configs', 'minimal-config.json');
      const config = await loadConfig(configPath);

      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for non-existent config file', async () => {
      await expect(loadConfig('/non/existent/config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw for invalid JSON', async () => {
      const configPath = getFixturePath('configs', 'invalid-json.json');

      await expect(loadConfig(configPath)).rejects.toThrow('Invalid JSON in config file');
    });

    it('should throw with field path for schema validation errors', async () => {
      const configPath = getFixturePath('configs', 'invalid-schema.json');

      await expect(loadConfig(configPath)).rejects.toThrow(/Invalid configuration:\n {2}- paraphrase\.numVariations: /);
      await expect(loadConfig(configPath)).rejects.toThrow('paraphrase.style');
    });
  });

  describe('getDefaultConfig', () => {
    it('should return the documented defaults', () => {
      const config = getDefaultConfig();

      expect(config.lexicon.source).toBe('wordnet');
      expect(config.lexicon.path).toBeUndefined();
      expect(config.paraphrase.numVariations).toBe(5);
      expect(config.paraphrase.seed).toBeUndefined();
      expect(config.bulk.maxParagraphs).toBe(50);
    });

    it('should return a new object each time', () => {
      const config1 = getDefaultConfig();
      const config2 = getDefaultConfig();

      expect(config1).not.toBe(config2);
      expect(config1).toEqual(config2);
    });
  });

  describe('findConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexiphrase-config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('should find lexiphrase.config.json in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, 'lexiphrase.config.json'), JSON.stringify({ paraphrase: { style: 'formal' } }));

      const config = await findConfig(tempDir);

      expect(config?.paraphrase.style).toBe('formal');
    });

    it('should find .lexiphraserc.json in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, '.lexiphraserc.json'), JSON.stringify({ paraphrase: { style: 'casual' } }));

      const config = await findConfig(tempDir);

      expect(config?.paraphrase.style).toBe('casual');
    });

    it('should find .lexiphraserc in current directory', async () => {
      fs.writeFileSync(path.join(tempDir, '.lexiphraserc'), JSON.stringify({ paraphrase: { style: 'simple' } }));

      const config = await findConfig(tempDir);

      expect(config?.paraphrase.style).toBe('simple');
    });

    it('should traverse parent directories to find config', async () => {
      fs.writeFileSync(path.join(tempDir, 'lexiphrase.config.json'), JSON.stringify({ bulk: { maxParagraphs: 7 } }));
      const childDir = path.join(tempDir, 'nested', 'deep');
      fs.mkdirSync(childDir, { recursive: true });

      const config = await findConfig(childDir);

      expect(config?.bulk.maxParagraphs).toBe(7);
    });

    it('should extract lexiphrase key from package.json', async () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({
        name: 'test-package',
        lexiphrase: { paraphrase: { numVariations: 2 } },
      }));

      const config = await findConfig(tempDir);

      expect(config?.paraphrase.numVariations).toBe(2);
    });

    it('should skip a package.json without a lexiphrase key', async () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({ name: 'test-package' }));

      expect(await findConfig(tempDir)).toBeNull();
    });

    it('should report an invalid lexiphrase key in package.json', async () => {
      const packagePath = path.join(tempDir, 'package.json');
      fs.writeFileSync(packagePath, JSON.stringify({ lexiphrase: { bulk: { maxParagraphs: 0 } } }));

      await expect(findConfig(tempDir)).rejects.toThrow(`Invalid configuration in ${packagePath}:`);
    });

    it('should log and skip an unreadable package.json', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const packagePath = path.join(tempDir, 'package.json');
      fs.writeFileSync(packagePath, '{ not json');

      expect(await findConfig(tempDir)).toBeNull();
      expect(errorSpy).toHaveBeenCalledWith(`Skipping unreadable ${packagePath}:`, expect.any(String));
    });

    it('should return null when no config is found', async () => {
      expect(await findConfig(tempDir)).toBeNull();
    });

    it('should prefer lexiphrase.config.json over package.json', async () => {
      fs.writeFileSync(path.join(tempDir, 'lexiphrase.config.json'), JSON.stringify({ paraphrase: { style: 'formal' } }));
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify({
        name: 'test',
        lexiphrase: { paraphrase: { style: 'casual' } },
      }));

      const config = await findConfig(tempDir);

      expect(config?.paraphrase.style).toBe('formal');
    });
  });

  describe('loadConfigOrDefault', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexiphrase-config-or-default-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load config when found', async () => {
      fs.writeFileSync(path.join(tempDir, 'lexiphrase.config.json'), JSON.stringify({ paraphrase: { seed: 3 } }));

      const config = await loadConfigOrDefault(tempDir);

      expect(config.paraphrase.seed).toBe(3);
    });

    it('should return default config when not found', async () => {
      const config = await loadConfigOrDefault(tempDir);

      expect(config).toEqual(getDefaultConfig());
    });
  });
  describe('project configs', () => {
    it('should load a config written into a project', async () => {
      const project = createTempProject({ 'lexiphrase.config.json': JSON.stringify(VALID_CONFIG) });
      try {
        const config = await findConfig(project.rootDir);

        expect(config?.lexicon).toEqual({ source: 'json', path: 'lexicon.json' });
        expect(config?.paraphrase.seed).toBe(7);
        expect(config?.thresholds.fallbackWordChange).toBe(0.6);
      } finally {
        project.cleanup();
      }
    });

    it('should treat an empty config as the defaults', async () => {
      const project = createTempProject({ '.lexiphraserc': JSON.stringify(MINIMAL_CONFIG) });
      try {
        expect(await loadConfigOrDefault(project.rootDir)).toEqual(getDefaultConfig());
      } finally {
        project.cleanup();
      }
    });

    it('should reject a project config that fails validation', async () => {
      const project = createTempProject({ '.lexiphraserc.json': JSON.stringify(INVALID_SCHEMA_CONFIG) });
      try {
        await expect(findConfig(project.rootDir)).rejects.toThrow('Invalid configuration:');
      } finally {
        project.cleanup();
      }
    });
  });
});
