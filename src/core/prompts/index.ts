/**
 * Prompt building for script scenes
 */
export type { PromptStyle, PromptStyleName, PromptContext } from './types.js';
export { PROMPT_STYLE_NAMES } from './types.js';
export { PromptStyleFactory } from './PromptStyleFactory.js';
export { CinematicPromptBuilder } from './CinematicPromptBuilder.js';
