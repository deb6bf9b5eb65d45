import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  configureDebug,
  debug,
  refreshDebugChannels,
} from "../src/debug.js";
import { resolveLocalizedFile } from "../src/file.js";
import { createMockFileSystem } from "../src/fs/mock-context.js";

describe("debug channels", () => {
  let messages: string[];

  beforeEach(() => {
    delete process.env["LOCALIZED_DOCS_DEBUG"];
    refreshDebugChannels();
    messages = [];
    configureDebug({ format: "pretty", output: (m) => messages.push(m) });
  });

  afterEach(() => {
    delete process.env["LOCALIZED_DOCS_DEBUG"];
    refreshDebugChannels();
    configureDebug({ format: "pretty", output: console.log });
  });

  it("is silent unless enabled", () => {
    debug.resolve("file.resolved", { srcPath: "index.md" });

    expect(messages).toEqual([]);
  });

  it("enables only the listed channels", () => {
    process.env["LOCALIZED_DOCS_DEBUG"] = "resolve";
    refreshDebugChannels();

    debug.resolve("point", { count: 2, locale: "fr" });
    debug.collect("point");

    expect(messages).toEqual(['[resolve.point] { count=2, locale="fr" }']);
  });

  it("writes JSON when configured", () => {
    process.env["LOCALIZED_DOCS_DEBUG"] = "*";
    refreshDebugChannels();
    configureDebug({ format: "json" });

    debug.config("options.normalized", { locales: ["en", "fr"] });

    expect(messages).toEqual([
      '{"channel":"config","point":"options.normalized","data":{"locales":["en","fr"]}}',
    ]);
  });

  it("prints the bare label when there is no data", () => {
    process.env["LOCALIZED_DOCS_DEBUG"] = " Collect ";
    refreshDebugChannels();

    debug.collect("pass.complete");

    expect(messages).toEqual(["[collect.pass.complete]"]);
  });

  it("reports missing translations on the resolve channel", () => {
    process.env["LOCALIZED_DOCS_DEBUG"] = "resolve";
    refreshDebugChannels();
    const fs = createMockFileSystem({ files: { "/docs/intro.md": "" } });

    resolveLocalizedFile(
      { kind: "page", srcPath: "intro.md", destPath: "intro/index.html" },
      {
        requestedLocale: "fr",
        defaultLocale: "en",
        allLocales: ["en", "fr"],
        docsDir: "/docs",
        siteDir: "/site",
        useDirectoryUrls: true,
      },
      fs,
    );

    expect(messages[0]).toBe('[resolve.translation.missing] { srcPath="intro.md", locale="fr", using="none" }');
  });
});
