export class DiaryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiaryError";
  }
}

/**
 * Structural problem in a diary header. Aborts parsing of that file only.
 */
export class ParseError extends DiaryError {
  readonly fileName: string;
  readonly line: number;
  readonly heading: string;

  constructor(message: string, details: { fileName: string; line: number; heading: string }) {
    super(
      [message, `  File: ${details.fileName}`, `  Line: ${details.line}`, `  Header: ${details.heading}`].join("\n")
    );
    this.name = "ParseError";
    this.fileName = details.fileName;
    this.line = details.line;
    this.heading = details.heading;
  }
}

/**
 * Bank export does not have the layout the adapter expects.
 */
export class FormatError extends DiaryError {
  readonly format: string;
  readonly field: string;
  readonly source: string;

  constructor(message: string, details: { format: string; field: string; source: string }) {
    super(`${message} (format: ${details.format}, file: ${details.source})`);
    this.name = "FormatError";
    this.format = details.format;
    this.field = details.field;
    this.source = details.source;
  }
}

export class SectionNotFoundError extends DiaryError {
  readonly date: string;
  readonly section?: string;

  constructor(date: string, section?: string) {
    super(
      section
        ? `No "${section}" subsection under ${date} and creating it is not allowed`
        : `No day section for ${date} and creating it is not allowed`
    );
    this.name = "SectionNotFoundError";
    this.date = date;
    this.section = section;
  }
}

export class CurrencyMismatchError extends DiaryError {
  constructor(left: string, right: string) {
    super(`Cannot combine ${left} with ${right}`);
    this.name = "CurrencyMismatchError";
  }
}

export class WriteConflictError extends DiaryError {
  readonly line: number;

  constructor(fileName: string, line: number, expected: string) {
    super(`Line ${line} of ${fileName} changed since it was read (expected "${expected}")`);
    this.name = "WriteConflictError";
    this.line = line;
  }
}

export class ConfigError extends DiaryError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
