import { readFileSync } from "node:fs";
import { describe, expect, it, vi } from "vitest";
import { readVersion, runVersion } from "../../commands/version.js";

const pkg: unknown = JSON.parse(
  readFileSync(new URL("../../../package.json", import.meta.url), "utf8"),
);

describe("version", () => {
  it("reads the version from package.json", () => {
    expect(pkg).toMatchObject({ version: readVersion() });
    expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("prints the CLI name and version", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    runVersion();

    expect(log).toHaveBeenCalledWith(`wsbridge ${readVersion()}`);
    log.mockRestore();
  });
});
