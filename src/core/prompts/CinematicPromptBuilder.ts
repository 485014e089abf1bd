import { PromptContext, PromptStyle } from './types.js';
import { PromptStyleFactory } from './PromptStyleFactory.js';

/**
 * Turns a script line into an image prompt.
 *
 * Format:
 * Scene 3: <line>. <style suffix> Use reference image '<description>' for <tags> consistency.
 *
 * Output depends only on the line, the context and the style.
 */
export class CinematicPromptBuilder {
  private readonly style: PromptStyle;

  constructor(style: PromptStyle = PromptStyleFactory.getStyle('cinematic')) {
    this.style = style;
  }

  build(line: string, context: PromptContext = {}): string {
    const text = line.trim();
    if (!text) {
      throw new Error('Cannot build a prompt from a blank script line');
    }

    const sentence = /[.!?]$/.test(text) ? text : `${text}.`;
    const scene = context.sceneNumber !== undefined ? `Scene ${context.sceneNumber}: ` : '';
    let prompt = `${scene}${sentence} ${this.style.suffix}`;

    const references = context.references ?? [];
    if (references.length > 0) {
      const hints = references.map((ref) => {
        const tags = ref.tags.length > 0 ? ref.tags.join(', ') : 'style';
        return `Use reference image '${ref.description}' for ${tags} consistency.`;
      });
      prompt += ` ${hints.join(' ')}`;
    }

    return prompt;
  }

  getStyle(): PromptStyle {
    return this.style;
  }
}
