import {
  CinematicPromptBuilder,
  PromptStyleFactory,
  PROMPT_STYLE_NAMES,
} from '../src/core/prompts/index.js';

const CINEMATIC_SUFFIX =
  'Cinematic depth, atmospheric lighting, professional cinematography, 8k resolution, dramatic composition.';

describe('CinematicPromptBuilder', () => {
  const builder = new CinematicPromptBuilder();

  test('appends the style suffix to the line', () => {
    expect(builder.build('A hero walks')).toBe(`A hero walks. ${CINEMATIC_SUFFIX}`);
  });

  test('keeps existing sentence punctuation', () => {
    expect(builder.build('Run!')).toBe(`Run! ${CINEMATIC_SUFFIX}`);
    expect(builder.build('  Who is there?  ')).toBe(`Who is there? ${CINEMATIC_SUFFIX}`);
  });

  test('prefixes the scene number', () => {
    expect(builder.build('The city burns', { sceneNumber: 3 })).toBe(
      `Scene 3: The city burns. ${CINEMATIC_SUFFIX}`
    );
  });

  test('describes every reference image in order', () => {
    const prompt = builder.build('A hero walks', {
      sceneNumber: 1,
      references: [
        { description: 'Hero portrait', tags: ['character', 'costume'] },
        { description: 'Moody alley', tags: [] },
      ],
    });

    expect(prompt).toBe(
      `Scene 1: A hero walks. ${CINEMATIC_SUFFIX} ` +
        "Use reference image 'Hero portrait' for character, costume consistency. " +
        "Use reference image 'Moody alley' for style consistency."
    );
  });

  test('is deterministic for the same input', () => {
    const context = { sceneNumber: 2, references: [{ description: 'Hero', tags: ['character'] }] };
    expect(builder.build('Dawn breaks', context)).toBe(builder.build('Dawn breaks', context));
  });

  test('rejects a blank line', () => {
    expect(() => builder.build('   ')).toThrow('Cannot build a prompt from a blank script line');
  });

  test('uses the configured style', () => {
    const noir = new CinematicPromptBuilder(PromptStyleFactory.getStyle('noir'));
    expect(noir.build('Rain on the window')).toBe(
      'Rain on the window. Film noir, high-contrast black and white, hard shadows, low-key lighting, 35mm film grain, moody composition.'
    );
    expect(noir.getStyle().label).toBe('Film noir');
  });
});

describe('PromptStyleFactory', () => {
  test('registers every named style', () => {
    expect(PromptStyleFactory.listStyles().map((style) => style.name)).toEqual([...PROMPT_STYLE_NAMES]);
  });

  test('rejects an unknown style', () => {
    expect(() => PromptStyleFactory.getStyle('vaporwave')).toThrow('Unknown prompt style: vaporwave');
  });
});
