/**
 * Base class for every failure that aborts a publish run
 */
export class ReleasePublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required environment variable or credential is missing or malformed
 */
export class ConfigurationError extends ReleasePublishError {}

/**
 * A local file (the version file or a binary) could not be read
 */
export class FileAccessError extends ReleasePublishError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Unable to read file: '${path}'`, options);
    this.path = path;
  }
}

export class ReleaseNotFoundError extends ReleasePublishError {
  readonly tag: string;

  constructor(tag: string) {
    super(`No release found for tag: '${tag}'`);
    this.tag = tag;
  }
}

/**
 * The hosting service rejected an asset upload
 */
export class UploadError extends ReleasePublishError {
  readonly assetName: string;

  constructor(assetName: string, options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to upload release asset '${assetName}'${reason}`, options);
    this.assetName = assetName;
  }
}
