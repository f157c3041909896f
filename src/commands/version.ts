/**
 * `wsbridge version`: print the package version.
 */
import { readFileSync } from "node:fs";

export function readVersion(): string {
  // Same relative path from src/commands and dist/commands
  const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

export function runVersion(): void {
  console.log(`wsbridge ${readVersion()}`);
}
