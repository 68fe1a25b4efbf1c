import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relative: string): string | undefined {
  try {
    const raw: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relative, import.meta.url)), "utf-8"));
    if (raw && typeof raw === "object") {
      const version: unknown = Reflect.get(raw, "version");
      return typeof version === "string" ? version : undefined;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version (single source of truth)
 *
 * Reads package.json relative to this file, which works both from src/
 * (tsx) and dist/src/ (node), with SERVICE_VERSION as an override.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ?? readPackageVersion("../package.json") ?? readPackageVersion("../../package.json") ?? "0.0.0";
