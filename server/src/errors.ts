export class ArtifactNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`artifact not found: ${filePath}`, options);
    this.name = "ArtifactNotFoundError";
    this.filePath = filePath;
  }
}

/** Neither UTF-8 nor Windows-1252 could decode the file. Usually on-disk corruption. */
export class DecodingFailureError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`unable to decode ${filePath} as utf-8 or windows-1252`);
    this.name = "DecodingFailureError";
    this.filePath = filePath;
  }
}
