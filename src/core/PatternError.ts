/**
 * Raised by Highlighter.addPattern when a pattern string does not compile.
 * The engine's SyntaxError is kept as `cause`.
 */
export class PatternError extends Error {
  constructor(
    public readonly pattern: string,
    cause: Error
  ) {
    super(`Invalid pattern "${pattern}": ${cause.message}`, { cause });
    this.name = 'PatternError';
  }
}
