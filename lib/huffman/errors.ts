export class HuffmanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HuffmanError";
  }
}

export class EmptyInputError extends HuffmanError {
  constructor(message = "Cannot encode an empty input") {
    super(message);
    this.name = "EmptyInputError";
  }
}

export class TruncatedStreamError extends HuffmanError {
  constructor(message = "Not enough bits: stream ended before the end-of-input code") {
    super(message);
    this.name = "TruncatedStreamError";
  }
}

export class MalformedContainerError extends HuffmanError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedContainerError";
  }
}

// Internal defects only; never part of the public error taxonomy.
export function assertInvariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Unexpected: ${message}`);
  }
}
