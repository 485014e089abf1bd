/**
 * One non-blank scene of a user script.
 * `index` is the 0-based position of the line in the raw script (blank lines
 * included), `lineNumber` the 1-based one shown to users.
 */
export interface ScriptLine {
  readonly index: number;
  readonly lineNumber: number;
  readonly text: string;
}
