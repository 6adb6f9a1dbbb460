import { describe, it, expect } from 'vitest';
import { ResumeAnalyzer } from '../analysis/resume-analyzer.js';
import { loadConfig, type GenerationOptions } from '../lib/config.js';
import { InputError, ServiceUnavailableError } from '../lib/errors.js';
import type { GenerateResult, ModelClient } from '../lib/ollama-client.js';

const VALID_REPLY = JSON.stringify({
  overall_impression: 'Capable engineer',
  strengths: ['APIs'],
  weaknesses: ['Few metrics'],
  key_skills: ['TypeScript'],
  recommendations: ['Quantify impact'],
});

class FakeModelClient implements ModelClient {
  readonly model = 'test-model';
  readonly prompts: string[] = [];
  readonly options: GenerationOptions[] = [];

  constructor(private readonly reply: () => string) {}

  async generate(prompt: string, options: GenerationOptions): Promise<GenerateResult> {
    this.prompts.push(prompt);
    this.options.push(options);
    const text = this.reply();
    return { text, envelope: { response: text } };
  }
}

function setup(reply: () => string = () => VALID_REPLY) {
  const config = loadConfig({});
  const client = new FakeModelClient(reply);
  return { config, client, analyzer: new ResumeAnalyzer({ config, client }) };
}

describe('ResumeAnalyzer', () => {
  it('rejects empty text without calling the model', async () => {
    const { analyzer, client } = setup();

    await expect(analyzer.analyze('')).rejects.toThrow('No resume text provided for analysis.');
    await expect(analyzer.analyze('  \n\t ')).rejects.toBeInstanceOf(InputError);
    expect(client.prompts).toHaveLength(0);
  });

  it('rejects a document that starts with non-resume material', async () => {
    const { analyzer, client } = setup();

    await expect(analyzer.analyze('To Whom It May Concern\nI recommend Jane.')).rejects.toBeInstanceOf(InputError);
    expect(client.prompts).toHaveLength(0);
  });

  it('returns the recovered record with provenance and stats', async () => {
    const { analyzer, client, config } = setup();

    const result = await analyzer.analyze('Jane Doe\nBuilt APIs in TypeScript', { analysisId: 'analysis-1' });

    expect(result).toEqual({
      record: {
        overall_impression: 'Capable engineer',
        strengths: ['APIs'],
        weaknesses: ['Few metrics'],
        key_skills: ['TypeScript'],
        recommendations: ['Quantify impact'],
      },
      source: 'model',
      strategy: 'direct',
      analysisId: 'analysis-1',
      model: 'test-model',
      stats: { input_words: 6, core_words: 6 },
    });
    expect(client.prompts[0]).toContain('Jane Doe\nBuilt APIs in TypeScript');
    expect(client.options[0]).toEqual(config.generation);
  });

  it('applies a per-call word ceiling', async () => {
    const { analyzer, client } = setup();

    const result = await analyzer.analyze('one two three four five', { maxWords: 2 });

    expect(result.stats).toEqual({ input_words: 5, core_words: 2 });
    expect(client.prompts[0]).toContain('\n\none two\n\n');
  });

  it('falls back when the reply cannot be parsed', async () => {
    const { analyzer } = setup(() => 'Sorry, I cannot help with that.');

    const result = await analyzer.analyze('Jane Doe\nBuilt APIs');

    expect(result.source).toBe('fallback');
    expect(result.strategy).toBeNull();
  });

  it('propagates transport failures', async () => {
    const { analyzer } = setup(() => {
      throw new ServiceUnavailableError('Could not connect');
    });

    await expect(analyzer.analyze('Jane Doe')).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});
