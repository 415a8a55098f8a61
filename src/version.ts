import fs from "node:fs";

function readPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (error) {
    console.warn(`[version] Could not read package.json: ${error instanceof Error ? error.message : String(error)}`);
  }
  return "0.0.0";
}

export const SERVER_NAME = "file-search-tools";
export const VERSION = readPackageVersion();
