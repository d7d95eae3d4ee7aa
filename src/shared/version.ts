import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read the version from package.json. Source (src/shared) and build
 * (dist/shared) output both sit two levels below the package root.
 */
export function getNetrecallVersion(): string {
  try {
    const content = fs.readFileSync(path.resolve(here, "..", "..", "package.json"), "utf-8");
    const pkg: unknown = JSON.parse(content);
    if (isRecord(pkg) && typeof pkg["version"] === "string") {
      return pkg["version"];
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}
