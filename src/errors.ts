/**
 * Parse errors
 *
 * Every failure is raised at first detection; a parse never returns a partial tree.
 */

export class YamlError extends Error {
  constructor(
    public reason: string,
    public line: number = -1
  ) {
    super(line >= 0 ? `yaml: ${reason} at line ${line}` : `yaml: ${reason}`);
    this.name = 'YamlError';
  }
}

/** A line sits at an indentation its container does not allow */
export class IndentationError extends YamlError {
  constructor(reason: string, line: number = -1) {
    super(reason, line);
    this.name = 'IndentationError';
  }
}

/** A token required to be a number, boolean or null is not one */
export class ScalarFormatError extends YamlError {
  constructor(reason: string, line: number = -1) {
    super(reason, line);
    this.name = 'ScalarFormatError';
  }
}

/** A bracket or quote is never closed */
export class UnterminatedLiteralError extends YamlError {
  constructor(reason: string, line: number = -1) {
    super(reason, line);
    this.name = 'UnterminatedLiteralError';
  }
}

/** A mapping entry lacks its key separator */
export class KeyFormatError extends YamlError {
  constructor(reason: string, line: number = -1) {
    super(reason, line);
    this.name = 'KeyFormatError';
  }
}
