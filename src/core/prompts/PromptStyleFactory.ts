import { PromptStyle, PromptStyleName } from './types.js';

/**
 * Registry of style presets
 */
export class PromptStyleFactory {
  private static styles: Map<PromptStyleName, PromptStyle> = new Map([
    [
      'cinematic',
      {
        name: 'cinematic',
        label: 'Cinematic',
        suffix:
          'Cinematic depth, atmospheric lighting, professional cinematography, 8k resolution, dramatic composition.',
      },
    ],
    [
      'noir',
      {
        name: 'noir',
        label: 'Film noir',
        suffix:
          'Film noir, high-contrast black and white, hard shadows, low-key lighting, 35mm film grain, moody composition.',
      },
    ],
    [
      'documentary',
      {
        name: 'documentary',
        label: 'Documentary',
        suffix:
          'Documentary realism, natural light, handheld camera, candid framing, muted color grade, 8k resolution.',
      },
    ],
    [
      'anime',
      {
        name: 'anime',
        label: 'Anime key visual',
        suffix:
          'Anime key visual, cel shading, vibrant palette, dynamic camera angle, detailed background art.',
      },
    ],
  ]);

  static getStyle(name: string): PromptStyle {
    for (const style of this.styles.values()) {
      if (style.name === name) {
        return style;
      }
    }
    throw new Error(`Unknown prompt style: ${name}`);
  }

  static listStyles(): PromptStyle[] {
    return Array.from(this.styles.values());
  }
}
