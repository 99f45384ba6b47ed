/**
 * Malformed diff input. Fatal for the whole batch being parsed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(`${message}: \`${input}\``);
    this.name = 'ParseError';
  }
}

/**
 * A broken tree contract, such as a duplicate sibling segment.
 * Signals a programming error rather than bad input.
 */
export class TreeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeInvariantError';
  }
}
