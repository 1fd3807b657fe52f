import * as core from "@actions/core";
import { Log } from "../release/Log";
import { stringify } from "./Util";

function format(parts: unknown[]): string {
  return parts
    .map((part) => {
      if (typeof part === "string") {
        return part;
      }
      if (part instanceof Error) {
        return part.message;
      }
      return stringify(part);
    })
    .join(" ");
}

/**
 * Writes to the workflow log through workflow commands
 */
export class GithubActionLog implements Log {
  debug(...parts: unknown[]): void {
    core.debug(format(parts));
  }

  info(...parts: unknown[]): void {
    core.info(format(parts));
  }

  warn(...parts: unknown[]): void {
    core.warning(format(parts));
  }

  error(...parts: unknown[]): void {
    core.error(format(parts));
  }

  group<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return core.group(name, fn);
  }
}
