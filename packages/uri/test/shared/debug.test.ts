import { afterEach, beforeEach, describe, test, expect } from "vitest";

import { configureDebug, getDebugChannel, isDebugEnabled, refreshDebugChannels } from "../../src/shared/debug.js";
import { parseUri, tryParseUri } from "../../src/parsing/parse.js";

describe("debug channels", () => {
  let lines: string[] = [];

  beforeEach(() => {
    lines = [];
    configureDebug({ output: (message) => lines.push(message), format: "pretty" });
  });

  afterEach(() => {
    delete process.env["URIKIT_DEBUG"];
    refreshDebugChannels();
    configureDebug({ output: console.log });
  });

  test("disabled channels write nothing", () => {
    delete process.env["URIKIT_DEBUG"];
    refreshDebugChannels();
    parseUri("a:b");
    expect(lines).toEqual([]);
    expect(isDebugEnabled()).toBe(false);
  });

  test("parse channel reports entry point results", () => {
    process.env["URIKIT_DEBUG"] = "parse";
    refreshDebugChannels();

    parseUri("a:b");
    tryParseUri("::");

    expect(isDebugEnabled("parse")).toBe(true);
    expect(isDebugEnabled("codec")).toBe(false);
    expect(lines).toEqual(['[parse.ok] { production="URI", length=3 }', '[parse.fail] { production="URI", input="::" }']);
  });

  test("build channel follows builder conversion", () => {
    process.env["URIKIT_DEBUG"] = "build";
    refreshDebugChannels();

    parseUri("a:b").builder();

    expect(lines).toEqual(['[build.uri] { raw="a:b" }']);
  });

  test("json format", () => {
    process.env["URIKIT_DEBUG"] = "*";
    refreshDebugChannels();
    configureDebug({ format: "json" });

    getDebugChannel("custom")("point", { n: 1 });

    expect(lines).toEqual(['{"channel":"custom","point":"point","data":{"n":1}}']);
    configureDebug({ format: "pretty" });
  });

  test("named channels pick up a later refresh", () => {
    const channel = getDebugChannel("Extra");
    channel("before");

    process.env["URIKIT_DEBUG"] = "extra";
    refreshDebugChannels();
    channel("after", { a: "x" });

    expect(lines).toEqual(['[extra.after] { a="x" }']);
  });
});
