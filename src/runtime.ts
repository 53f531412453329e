import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

export const isMainModule = (metaUrl: string): boolean => {
  if (!process.argv[1]) {
    return false;
  }

  const mainPath = resolve(process.argv[1]);
  const selfPath = fileURLToPath(metaUrl);

  return mainPath === selfPath;
};

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../package.json", import.meta.url), "utf8")
    );
    if (
      typeof raw === "object" &&
      raw !== null &&
      "version" in raw &&
      typeof raw.version === "string"
    ) {
      return raw.version;
    }
  } catch {
    // Running from a layout without package.json beside src/.
  }
  return "0.0.0";
}

export const packageVersion = readPackageVersion();
