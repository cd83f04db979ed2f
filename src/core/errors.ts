/**
 * Custom error classes for remint.
 */

/**
 * Position of a line in the input, used to locate data errors.
 */
export interface SourceLocation {
  source: string;
  line: number;
}

export function formatLocation(location?: SourceLocation): string {
  return location ? ` (${location.source}:${location.line})` : "";
}

export class RemintError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "RemintError";
  }
}

export class LayoutError extends RemintError {
  constructor() {
    super(
      "No column layout is available yet.\n" +
        "A header line followed by a separator line must come first.",
      1
    );
    this.name = "LayoutError";
  }
}

export class TimeParseError extends RemintError {
  constructor(
    public readonly text: string,
    public readonly location?: SourceLocation
  ) {
    super(`Cannot parse timestamp "${text}"${formatLocation(location)}`, 1);
    this.name = "TimeParseError";
  }
}

export class UnknownColumnError extends RemintError {
  constructor(
    public readonly category: string,
    public readonly column: string
  ) {
    super(
      `Unknown column "${column}" for category ${category}\n` +
        "Check the diff and pivot settings against the header of the input.",
      1
    );
    this.name = "UnknownColumnError";
  }
}

export class ConfigError extends RemintError {
  constructor(
    path: string,
    public readonly issues: string[]
  ) {
    super(
      `Invalid configuration: ${path}\n` +
        issues.map((issue) => `  - ${issue}`).join("\n"),
      2
    );
    this.name = "ConfigError";
  }
}

export class InputFileError extends RemintError {
  constructor(
    path: string,
    public readonly reason: string
  ) {
    super(`Cannot read input file: ${path}\n${reason}`, 1);
    this.name = "InputFileError";
  }
}

export class AssemblerClosedError extends RemintError {
  constructor() {
    super("The assembler has already been closed.", 1);
    this.name = "AssemblerClosedError";
  }
}
