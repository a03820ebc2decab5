import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

export interface PackageMeta {
  name?: string;
  version?: string;
  description?: string;
}

export function readPackageMeta(): PackageMeta {
  const candidates = [
    path.resolve(__dirname, "../../package.json"),
    path.resolve(__dirname, "../package.json")
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(candidate, "utf8")) as unknown;
    } catch {
      continue;
    }
    if (isRecord(parsed)) {
      return {
        name: typeof parsed.name === "string" ? parsed.name : undefined,
        version: typeof parsed.version === "string" ? parsed.version : undefined,
        description: typeof parsed.description === "string" ? parsed.description : undefined
      };
    }
  }

  return {};
}
