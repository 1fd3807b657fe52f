import path from "path";

/**
 * A built binary, located at <output>/<relativeDirectory>/<fileBaseName>
 */
export interface BinaryDescriptor {
  readonly relativeDirectory: string;
  readonly fileBaseName: string;
}

/**
 * Binaries attached to every release, uploaded in this order.
 * Supporting another platform is a new row here.
 */
export const RELEASE_BINARIES: readonly BinaryDescriptor[] = Object.freeze([
  {
    relativeDirectory: "darwin-amd64",
    fileBaseName: "gardenctl_v2_darwin_amd64",
  },
  {
    relativeDirectory: "linux-amd64",
    fileBaseName: "gardenctl_v2_linux_amd64",
  },
]);

export const ASSET_CONTENT_TYPE = "application/octet-stream";

export function binaryPath(
  outputPath: string,
  { relativeDirectory, fileBaseName }: BinaryDescriptor
): string {
  return path.join(outputPath, relativeDirectory, fileBaseName);
}

export function assetName(
  { fileBaseName }: BinaryDescriptor,
  versionTag: string
): string {
  return `${fileBaseName}-${versionTag}`;
}
