import * as core from "@actions/core";
import * as fs from "fs";
import { FileHandle } from "fs/promises";
import {
  ASSET_CONTENT_TYPE,
  assetName,
  BinaryDescriptor,
  binaryPath,
  RELEASE_BINARIES,
} from "../release/Binaries";
import { FileAccessError, ReleaseNotFoundError } from "../release/errors";
import { Log } from "../release/Log";
import {
  Environment,
  getGithubToken,
  ReleaseContext,
  resolveReleaseContext,
} from "../release/ReleaseContext";
import { GithubActionLog } from "./GithubActionLog";
import {
  dashWrap,
  debugLog,
  getClient,
  GithubClient,
  ReleaseAsset,
  ReleaseHandle,
} from "./GithubClient";
import { stringify } from "./Util";

export type ReleaseClient = Pick<
  GithubClient,
  "findRelease" | "uploadReleaseAsset"
>;

export interface PublishReleaseAssetsOptions {
  context: ReleaseContext;
  client: ReleaseClient;
  binaries?: readonly BinaryDescriptor[];
  log?: Log;
}

/**
 * Opens a binary, uploads its bytes and closes it again whatever the
 * outcome of the upload. A failure to close only fails the upload when
 * nothing else did.
 */
async function uploadBinary(
  client: ReleaseClient,
  release: ReleaseHandle,
  file: string,
  name: string,
  log: Log
): Promise<ReleaseAsset> {
  let handle: FileHandle;
  try {
    handle = await fs.promises.open(file, "r");
  } catch (e) {
    throw new FileAccessError(file, { cause: e });
  }

  let asset: ReleaseAsset;
  try {
    let contents: Buffer;
    try {
      contents = await handle.readFile();
    } catch (e) {
      throw new FileAccessError(file, { cause: e });
    }

    asset = await client.uploadReleaseAsset({
      release,
      assetName: name,
      contents,
      contentType: ASSET_CONTENT_TYPE,
    });
  } catch (e) {
    await handle.close().catch((closeError: unknown) => {
      log.warn(`Unable to close '${file}':`, closeError);
    });
    throw e;
  }

  await handle.close();
  return asset;
}

/**
 * Uploads each binary, in order, to the release tagged with the context's
 * version. Stops at the first failure.
 */
export async function publishReleaseAssets({
  context,
  client,
  binaries = RELEASE_BINARIES,
  log = new GithubActionLog(),
}: PublishReleaseAssetsOptions): Promise<ReleaseAsset[]> {
  const { versionTag, outputPath } = context;

  const release = await client.findRelease({ tag: versionTag });
  if (!release) {
    throw new ReleaseNotFoundError(versionTag);
  }

  log.info(dashWrap(`Attaching binaries to release: '${release.tag_name}'`));

  const uploaded: ReleaseAsset[] = [];
  for (const binary of binaries) {
    const file = binaryPath(outputPath, binary);
    const name = assetName(binary, versionTag);

    log.info(`Uploading ${file} as ${name}`);
    let asset: ReleaseAsset;
    try {
      asset = await uploadBinary(client, release, file, name, log);
    } catch (e) {
      log.error(`Publishing ${name} failed, skipping remaining binaries`);
      throw e;
    }
    log.debug(`Uploaded asset ${asset.id}: ${asset.browser_download_url}`);

    uploaded.push(asset);
  }
  return uploaded;
}

/**
 * Resolves the run's context from the environment, then publishes the
 * binaries and records what was uploaded as step outputs
 */
export async function runPublishAction(
  env: Environment = process.env,
  log: Log = new GithubActionLog()
): Promise<ReleaseAsset[]> {
  log.info(dashWrap("Publishing release binaries"));

  const context = await resolveReleaseContext(env);
  const token = getGithubToken(env);

  debugLog("Got release context:", context);

  const client = getClient(
    { owner: context.repositoryOwner, repo: context.repositoryName },
    token
  );

  const assets = await log.group(
    `Uploading ${RELEASE_BINARIES.length} binaries for ${context.versionTag}`,
    async () => publishReleaseAssets({ context, client, log })
  );

  core.setOutput("release-tag", context.versionTag);
  core.setOutput("assets", JSON.stringify(assets.map((a) => a.name)));

  return assets;
}

/**
 * Executes the provided callback and wraps any exceptions in a build failure
 */
export async function runAndFailBuildOnException<T>(
  fn: () => Promise<T>
): Promise<T | void> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof Error) {
      core.setFailed(e.message);
    } else if (e instanceof Object) {
      core.setFailed(`Action failed: ${stringify(e)}`);
    } else {
      core.setFailed(`An unknown error occurred: ${stringify(e)}`);
    }
  }
}
