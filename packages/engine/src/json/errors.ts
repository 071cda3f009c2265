export class JsonSyntaxError extends Error {
  readonly code = "SYNTAX_ERROR";

  constructor(
    message: string,
    readonly position: number,
  ) {
    super(`${message} at position ${position}`);
    this.name = "JsonSyntaxError";
  }
}

export class UnsupportedTypeError extends Error {
  readonly code = "UNSUPPORTED_TYPE";

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedTypeError";
  }
}
