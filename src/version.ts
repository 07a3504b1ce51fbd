import { readFileSync } from "node:fs";

// Sources sit one level below package.json, compiled output two.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL(candidate, import.meta.url), "utf-8"));
      if (typeof pkg === "object" && pkg !== null) {
        const version: unknown = Reflect.get(pkg, "version");
        if (typeof version === "string") return version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export const VERSION = process.env.CPI_AWS_VERSION || readVersionFromPackageJson() || "0.0.0";
