import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../http/api-error";

export type AllowList = ReadonlySet<string>;

function canonicalDeviceId(value: string): string {
  return value.trim().toUpperCase();
}

export function parseAllowList(contents: string): AllowList {
  const allowed = new Set<string>();
  for (const line of contents.split(/\r?\n/)) {
    const value = line.trim();
    if (value.length === 0 || value.startsWith("#")) {
      continue;
    }
    allowed.add(canonicalDeviceId(value));
  }
  return allowed;
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Gate for ingestion. The file is read again on every check, so edits apply
 * to the next request without a restart.
 */
export class DeviceAuthorizer {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  /** `null` means no allow-list is configured. */
  async load(): Promise<AllowList | null> {
    try {
      const info = await stat(this.filePath);
      if (!info.isFile()) {
        return null;
      }
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw new ConfigError(`Unable to inspect allow-list file: ${this.filePath}`, { cause: error });
    }

    try {
      return parseAllowList(await readFile(this.filePath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Allow-list file is not readable: ${this.filePath}`, { cause: error });
    }
  }

  async isAllowed(deviceId: string): Promise<boolean> {
    const allowed = await this.load();
    if (allowed === null) {
      return true;
    }
    return allowed.has(canonicalDeviceId(deviceId));
  }
}
