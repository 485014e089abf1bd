/**
 * Style preset identifiers
 */
export type PromptStyleName = 'cinematic' | 'noir' | 'documentary' | 'anime';

export const PROMPT_STYLE_NAMES: readonly PromptStyleName[] = [
  'cinematic',
  'noir',
  'documentary',
  'anime',
];

/**
 * Look-and-feel appended to every scene description
 */
export interface PromptStyle {
  name: PromptStyleName;
  label: string;
  suffix: string;
}

/**
 * Per-scene context for prompt building
 */
export interface PromptContext {
  /** 1-based scene number, rendered as a "Scene <n>: " prefix */
  sceneNumber?: number;
  references?: ReadonlyArray<{ description: string; tags: readonly string[] }>;
}
