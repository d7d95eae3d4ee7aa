import { describe, it, expect } from "vitest";
import { getNetrecallVersion } from "./version.js";

describe("getNetrecallVersion", () => {
  it("reads a semantic version from package.json", () => {
    expect(getNetrecallVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
