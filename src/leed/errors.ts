/** Invalid configuration or request. Fatal at construction time. */
export class InputError extends Error {
  override name = "InputError";
}

/** The solver ran but its output holds no usable R-factor. */
export class ResultExtractionError extends Error {
  override name = "ResultExtractionError";
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.filePath = filePath;
  }
}
