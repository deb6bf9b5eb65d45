import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { discoverFiles, getDefaultDestPath, getDocumentKind } from "../src/discover.js";
import { resolveLocalizedFile } from "../src/file.js";
import { createMockFileSystem } from "../src/fs/mock-context.js";
import { createNodeFileSystem } from "../src/fs/node-context.js";

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "localized-docs-"));
  try {
    return fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function writeFiles(root: string, files: readonly string[]): void {
  for (const file of files) {
    const abs = path.join(root, file);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, "");
  }
}

describe("getDocumentKind", () => {
  it("classifies markdown extensions as pages", () => {
    expect(getDocumentKind("guide/intro.md")).toBe("page");
    expect(getDocumentKind("guide/intro.fr.markdown")).toBe("page");
    expect(getDocumentKind("README.MD")).toBe("page");
  });

  it("classifies everything else as assets", () => {
    expect(getDocumentKind("img/logo.png")).toBe("asset");
    expect(getDocumentKind("LICENSE")).toBe("asset");
  });
});

describe("getDefaultDestPath", () => {
  it("places pages the way a non-localized build would", () => {
    expect(getDefaultDestPath("index.md", "page", true)).toBe("index.html");
    expect(getDefaultDestPath("guide/README.md", "page", true)).toBe("guide/index.html");
    expect(getDefaultDestPath("guide/intro.fr.md", "page", true)).toBe("guide/intro.fr/index.html");
    expect(getDefaultDestPath("guide/intro.md", "page", false)).toBe("guide/intro.html");
  });

  it("keeps assets in place", () => {
    expect(getDefaultDestPath("img/logo.fr.png", "asset", true)).toBe("img/logo.fr.png");
  });
});

describe("discoverFiles", () => {
  it("walks an in-memory docs tree in sorted order, skipping dot entries", () => {
    const mock = createMockFileSystem({
      files: {
        "/docs/index.md": "",
        "/docs/guide/intro.md": "",
        "/docs/guide/intro.fr.md": "",
        "/docs/img/logo.png": "",
        "/docs/.git/config": "",
        "/docs/.nojekyll": "",
      },
    });

    expect(discoverFiles(mock, "/docs")).toEqual([
      { kind: "page", srcPath: "guide/intro.fr.md", destPath: "guide/intro.fr/index.html" },
      { kind: "page", srcPath: "guide/intro.md", destPath: "guide/intro/index.html" },
      { kind: "asset", srcPath: "img/logo.png", destPath: "img/logo.png" },
      { kind: "page", srcPath: "index.md", destPath: "index.html" },
    ]);
  });

  it("returns nothing for a missing docs directory", () => {
    expect(discoverFiles(createMockFileSystem(), "/missing")).toEqual([]);
  });

  it("walks and resolves against the real file system", () => {
    withTempDir((dir) => {
      const docsDir = path.join(dir, "docs");
      writeFiles(docsDir, ["index.md", "guide/intro.md", "guide/intro.fr.md"]);
      const nodeFs = createNodeFileSystem();

      const discovered = discoverFiles(nodeFs, docsDir, { useDirectoryUrls: false });
      expect(discovered.map((f) => f.srcPath)).toEqual([
        "guide/intro.fr.md",
        "guide/intro.md",
        "index.md",
      ]);
      expect(discovered[1]?.destPath).toBe("guide/intro.html");

      const context = {
        requestedLocale: "fr",
        defaultLocale: "en",
        allLocales: ["en", "fr"],
        docsDir,
        siteDir: path.join(dir, "site"),
        useDirectoryUrls: false,
      };
      const [fr, bare] = discovered.map((f) => resolveLocalizedFile(f, context, nodeFs));

      expect(fr?.srcPath).toBe("guide/intro.fr.md");
      expect(bare?.srcPath).toBe("guide/intro.fr.md");
      expect(bare?.absDestPath).toBe(path.join(dir, "site", "fr", "guide", "intro.html"));
      expect(bare?.url).toBe("fr/guide/intro.html");
    });
  });
});
