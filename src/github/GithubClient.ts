import * as core from "@actions/core";
import * as github from "@actions/github";
import { GitHub } from "@actions/github/lib/utils";
import { Release } from "@octokit/webhooks-types";
import { UploadError } from "../release/errors";
import { stringify } from "./Util";

export type GithubRepo = { owner: string; repo: string };

/**
 * The parts of a release needed to attach assets to it
 */
export type ReleaseHandle = Pick<
  Release,
  "id" | "tag_name" | "upload_url" | "draft"
>;

/**
 * Basic release asset information
 */
export interface ReleaseAsset {
  id: number;
  name: string;
  browser_download_url: string;
}

/**
 * Common interface for methods requiring a release
 */
interface ReleaseProps {
  release: ReleaseHandle;
}

/**
 * Wraps a string in dashes
 */
export function dashWrap(str: string): string {
  let out = ` ${str} `;
  const width = 80;
  while (out.length < width) {
    out = `-${out}-`;
  }
  if (out.length > width) {
    out = out.substring(0, width);
  }
  return out;
}

/**
 * Attempts to intelligently log all objects passed in when debug is enabled
 */
export function debugLog(label: string, ...args: unknown[]): void {
  if (!core.isDebug()) {
    return;
  }
  core.startGroup(label);
  try {
    for (const arg of args) {
      if (typeof arg === "string") {
        core.debug(arg);
      } else if (arg instanceof Error) {
        core.debug(arg.message);
        core.debug(stringify(arg.stack));
      } else {
        core.debug(stringify(arg));
      }
    }
  } finally {
    core.endGroup();
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "status" in e && e.status === 404;
}

/**
 * Provides a basic shim to interact with the necessary Github APIs
 */
export class GithubClient {
  client: InstanceType<typeof GitHub>;

  repo: GithubRepo;

  constructor(client: InstanceType<typeof GitHub>, repo: GithubRepo) {
    this.client = client;
    this.repo = repo;
  }

  /**
   * Finds a release by tag name, falling back to drafts, which the
   * tag lookup does not return
   * @param tag
   */
  async findRelease({
    tag,
  }: {
    tag: string;
  }): Promise<ReleaseHandle | undefined> {
    core.debug(`Getting release by tag: ${tag}`);
    try {
      const response = await this.client.rest.repos.getReleaseByTag({
        ...this.repo,
        tag,
      });

      debugLog("getReleaseByTag response:", response.data);
      return response.data;
    } catch (e) {
      if (!isNotFound(e)) {
        throw e;
      }
      debugLog("Release not found by tag name:", e);
    }

    core.debug(`No release found for ${tag}, looking for draft release...`);
    return this.findDraftRelease({ tag });
  }

  /**
   * Finds a draft release by tag
   * @param tag release tag_name to search by
   */
  async findDraftRelease({
    tag,
  }: {
    tag: string;
  }): Promise<ReleaseHandle | undefined> {
    debugLog(`Getting draft release by tag: ${tag}`);
    const releases = await this.client.paginate(
      this.client.rest.repos.listReleases,
      {
        ...this.repo,
        per_page: 100,
      }
    );

    const release = releases
      .filter((r) => r.draft)
      .find((r) => r.tag_name === tag);

    debugLog("listReleases filtered response:", release);

    return release;
  }

  /**
   * Uploads a release asset
   * @param release release to attach the asset to
   * @param assetName name of the asset
   * @param contents raw bytes of the asset
   * @param contentType content type of the asset
   */
  async uploadReleaseAsset({
    release,
    assetName,
    contents,
    contentType,
  }: ReleaseProps & {
    assetName: string;
    contents: Buffer;
    contentType: string;
  }): Promise<ReleaseAsset> {
    // the typed repos.uploadReleaseAsset only takes string data, which
    // would re-encode the bytes, so post to the upload url directly
    try {
      const response = await this.client.request({
        method: "POST",
        url: release.upload_url,
        name: assetName,
        data: contents,
        headers: {
          "content-type": contentType,
          "content-length": contents.length,
        },
      });

      debugLog("uploadReleaseAsset response:", response.data);

      const asset: ReleaseAsset = response.data;
      return asset;
    } catch (e) {
      throw new UploadError(assetName, { cause: e });
    }
  }
}

/**
 * Returns a GitHubClient
 * @param repo repository to use
 * @param githubToken authentication token
 */
export function getClient(repo: GithubRepo, githubToken: string): GithubClient {
  const octokit = github.getOctokit(githubToken);
  return new GithubClient(octokit, repo);
}
