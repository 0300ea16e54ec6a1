import { describe, it, expect } from 'vitest';
import { getDefaultConfig } from '../../../src/config/loader.js';
import { createAppContext } from '../../../src/context.js';
import { getFixturePath, createStubAnalyzer, loadFixtureLexicon } from '../../helpers/fixtures.js';

describe('createAppContext', () => {
  it('uses the lexicon and analyzer overrides', async () => {
    const lexicon = loadFixtureLexicon();
    const context = await createAppContext(getDefaultConfig(), { lexicon, analyzer: createStubAnalyzer() });

    expect(context.lexicon).toBe(lexicon);
    expect(context.paraphraser.paraphrase('The cat sat.').wordReplacements).toHaveProperty('cat');
  });

  it('loads the configured lexicon', async () => {
    const config = getDefaultConfig();
    config.lexicon = { source: 'json', path: getFixturePath('lexicon', 'basic.json') };

    const context = await createAppContext(config, { analyzer: createStubAnalyzer() });

    expect(context.lexicon.synsetsFor('mat').map(s => s.id)).toEqual(['mat.n.01']);
  });

  it('gives reproducible output for a configured seed', async () => {
    const config = getDefaultConfig();
    config.paraphrase.seed = 11;
    const overrides = () => ({ lexicon: loadFixtureLexicon(), analyzer: createStubAnalyzer() });

    const first = await createAppContext(config, overrides());
    const second = await createAppContext(config, overrides());

    expect(first.paraphraser.paraphrase('The cat sat on the mat.').variations)
      .toEqual(second.paraphraser.paraphrase('The cat sat on the mat.').variations);
  });
});
