import { createRequire } from "node:module";
import { isRecord } from "./accessors.js";

/** package.json sits one level up from src/, two from dist/src/. */
function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (isRecord(pkg) && pkg.name === "driftlens" && typeof pkg.version === "string") return pkg.version;
    } catch {
      continue;
    }
  }
  return null;
}

// Release builds may inject the version through the environment.
export const VERSION = process.env.DRIFTLENS_VERSION || readVersionFromPackageJson() || "0.0.0";
