import { ScriptLine } from '../entities/ScriptLine.js';

/**
 * Split a script into scenes, dropping blank lines but keeping each
 * scene's original position.
 */
export function parseScript(script: string | readonly string[]): ScriptLine[] {
  const rawLines = typeof script === 'string' ? script.split(/\r?\n/) : script;
  const lines: ScriptLine[] = [];

  rawLines.forEach((raw, index) => {
    const text = raw.trim();
    if (text) {
      lines.push({ index, lineNumber: index + 1, text });
    }
  });

  return lines;
}
