import { describe, it, expect } from "vitest";
import {
  fileName,
  joinRelative,
  normalizeRelative,
  parentOf,
  stem,
  suffix,
  suffixes,
  toPosix,
  withSuffix,
} from "../src/paths.js";

describe("paths", () => {
  describe("suffix chain", () => {
    it("splits the final component into suffix tokens", () => {
      expect(suffixes("guide/intro.fr.md")).toEqual([".fr", ".md"]);
      expect(suffixes("dist/archive.tar.gz")).toEqual([".tar", ".gz"]);
      expect(suffixes("v1.2/notes.md")).toEqual([".md"]);
    });

    it("ignores leading dots and trailing dots", () => {
      expect(suffixes(".nojekyll")).toEqual([]);
      expect(suffixes("notes.")).toEqual([]);
      expect(suffix(".nojekyll")).toBe("");
    });

    it("returns the last suffix and the stem", () => {
      expect(suffix("guide/intro.fr.md")).toBe(".md");
      expect(stem("guide/intro.fr.md")).toBe("intro.fr");
      expect(suffix("LICENSE")).toBe("");
      expect(stem("LICENSE")).toBe("LICENSE");
    });
  });

  describe("withSuffix", () => {
    it("replaces the last suffix", () => {
      expect(withSuffix("guide/intro.md", ".fr.md")).toBe("guide/intro.fr.md");
    });

    it("strips the last suffix when given an empty one", () => {
      expect(withSuffix("guide/intro.fr.md", "")).toBe("guide/intro.fr");
      expect(withSuffix(withSuffix("guide/intro.fr.md", ""), "")).toBe("guide/intro");
    });

    it("appends when there is no suffix", () => {
      expect(withSuffix("intro", ".fr")).toBe("intro.fr");
    });
  });

  describe("components", () => {
    it("splits parent and file name", () => {
      expect(fileName("guide/setup/intro.md")).toBe("intro.md");
      expect(parentOf("guide/setup/intro.md")).toBe("guide/setup");
      expect(parentOf("intro.md")).toBe("");
    });

    it("joins non-empty segments", () => {
      expect(joinRelative("", "index.html")).toBe("index.html");
      expect(joinRelative("guide", "intro", "index.html")).toBe("guide/intro/index.html");
    });
  });

  describe("normalization", () => {
    it("converts separators", () => {
      expect(toPosix("guide\\intro.md")).toBe("guide/intro.md");
      expect(normalizeRelative("guide\\intro.md")).toBe("guide/intro.md");
    });

    it("drops ./ segments, duplicate and trailing slashes", () => {
      expect(normalizeRelative("./guide//intro.md")).toBe("guide/intro.md");
      expect(normalizeRelative("guide/")).toBe("guide");
      expect(normalizeRelative(".")).toBe("");
    });
  });
});
