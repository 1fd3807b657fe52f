import * as fs from "fs";
import path from "path";
import { ConfigurationError, FileAccessError } from "./errors";

export const REPOSITORY_ENV_VAR = "SOURCE_GITHUB_REPO_OWNER_AND_NAME";
export const CHECKOUT_DIR_ENV_VAR = "MAIN_REPO_DIR";
export const BINARY_DIR_ENV_VAR = "BINARY_PATH";
export const TOKEN_ENV_VAR = "GITHUB_TOKEN";
// where the runner puts the github-token action input
export const TOKEN_INPUT_ENV_VAR = "INPUT_GITHUB-TOKEN";

export const VERSION_FILE_NAME = "VERSION";

export type Environment = Record<string, string | undefined>;

export interface ReleaseContext {
  readonly repositoryOwner: string;
  readonly repositoryName: string;
  readonly versionTag: string;
  readonly checkoutPath: string;
  readonly outputPath: string;
}

/**
 * Returns the trimmed value of an environment variable, failing when it is
 * absent or blank
 */
export function requireEnv(env: Environment, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `Required environment variable is not set: ${name}`
    );
  }
  return value;
}

/**
 * Splits an "<owner>/<name>" repository identifier
 */
export function parseRepository(value: string): {
  owner: string;
  repo: string;
} {
  const parts = value.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(
      `Invalid repository '${value}', expected '<owner>/<name>'`
    );
  }
  const [owner, repo] = parts;
  return { owner, repo };
}

/**
 * The github-token input takes precedence over GITHUB_TOKEN
 */
export function getGithubToken(env: Environment): string {
  const token =
    env[TOKEN_INPUT_ENV_VAR]?.trim() || env[TOKEN_ENV_VAR]?.trim();
  if (!token) {
    throw new ConfigurationError(
      `No GitHub token provided, set the github-token input or ${TOKEN_ENV_VAR}`
    );
  }
  return token;
}

/**
 * Reads the version tag from <checkoutPath>/VERSION
 */
export async function readVersion(checkoutPath: string): Promise<string> {
  const versionFile = path.join(checkoutPath, VERSION_FILE_NAME);
  let contents: string;
  try {
    contents = await fs.promises.readFile(versionFile, "utf8");
  } catch (e) {
    throw new FileAccessError(versionFile, { cause: e });
  }
  const version = contents.trim();
  if (!version) {
    throw new ConfigurationError(`Version file is empty: '${versionFile}'`);
  }
  return version;
}

/**
 * Builds the context for a publish run. Every variable is checked before
 * the version file is read.
 */
export async function resolveReleaseContext(
  env: Environment = process.env
): Promise<ReleaseContext> {
  const repository = requireEnv(env, REPOSITORY_ENV_VAR);
  const checkoutDir = requireEnv(env, CHECKOUT_DIR_ENV_VAR);
  const binaryDir = requireEnv(env, BINARY_DIR_ENV_VAR);

  const { owner, repo } = parseRepository(repository);
  const checkoutPath = path.resolve(checkoutDir);
  const versionTag = await readVersion(checkoutPath);

  return Object.freeze({
    repositoryOwner: owner,
    repositoryName: repo,
    versionTag,
    checkoutPath,
    outputPath: path.resolve(binaryDir),
  });
}
