export class InvalidUrlError extends Error {
  readonly name = "InvalidUrlError";
  readonly kind = "invalid-url";

  constructor(public readonly url: string) {
    super(url ? `"${url}" is not a valid absolute URL` : "No URL was provided");
  }
}

export class InvalidFileNameError extends Error {
  readonly name = "InvalidFileNameError";
  readonly kind = "invalid-file-name";

  constructor(
    public readonly path: string,
    public readonly allowedExtensions: readonly string[]
  ) {
    super(`"${path}" has no file extension; expected one of ${allowedExtensions.join(", ")}`);
  }
}

export class InvalidExtensionError extends Error {
  readonly name = "InvalidExtensionError";
  readonly kind = "invalid-extension";

  constructor(
    public readonly path: string,
    public readonly extension: string,
    public readonly allowedExtensions: readonly string[]
  ) {
    super(
      `"${path}" has extension "${extension}"; expected one of ${allowedExtensions.join(", ")}`
    );
  }
}

export class DownloadFailedError extends Error {
  readonly name = "DownloadFailedError";
  readonly kind = "download-failed";

  constructor(
    public readonly url: string,
    public readonly cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to download ${url}: ${reason}`);
  }
}

export class NotHtmlOperationError extends Error {
  readonly name = "NotHtmlOperationError";
  readonly kind = "not-html-operation";

  constructor(
    public readonly url: string,
    public readonly contentType: string,
    operation: string
  ) {
    super(`${operation} needs HTML content, but ${url} is "${contentType || "unknown"}"`);
  }
}

export class MissingTitleError extends Error {
  readonly name = "MissingTitleError";
  readonly kind = "missing-title";

  constructor(public readonly url: string) {
    super(`${url} has no <title> to name the output file after; pass a file path instead`);
  }
}

export type BuilderError =
  | InvalidUrlError
  | InvalidFileNameError
  | InvalidExtensionError
  | DownloadFailedError
  | NotHtmlOperationError
  | MissingTitleError;

export const isBuilderError = (error: unknown): error is BuilderError =>
  error instanceof InvalidUrlError ||
  error instanceof InvalidFileNameError ||
  error instanceof InvalidExtensionError ||
  error instanceof DownloadFailedError ||
  error instanceof NotHtmlOperationError ||
  error instanceof MissingTitleError;
