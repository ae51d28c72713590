/**
 * Renderer tests.
 */

import chalk from "chalk";
import { describe, expect, it } from "vitest";
import { renderFactsJson, renderFactsText, renderFactValue } from "../src/render/index.js";

describe("renderFactValue", () => {
  it("should print strings as-is", () => {
    expect(renderFactValue("x86_64")).toBe("x86_64");
  });

  it("should print other values as compact JSON", () => {
    expect(renderFactValue(8)).toBe("8");
    expect(renderFactValue(false)).toBe("false");
    expect(renderFactValue(null)).toBe("null");
    expect(renderFactValue(["eth0", "lo"])).toBe('["eth0","lo"]');
    expect(renderFactValue({ family: "Debian" })).toBe('{"family":"Debian"}');
  });
});

describe("renderFactsText", () => {
  it("should print one fact per line", () => {
    const text = renderFactsText({ kernel: "Linux", cores: 8, os: { family: "Debian" } });

    expect(text).toBe('kernel => Linux\ncores => 8\nos => {"family":"Debian"}');
  });

  it("should color keys and separators", () => {
    const text = renderFactsText({ kernel: "Linux" }, { color: true });

    expect(text).toBe(`${chalk.cyan("kernel")}${chalk.dim(" => ")}Linux`);
  });

  it("should print nothing for no facts", () => {
    expect(renderFactsText({})).toBe("");
  });
});

describe("renderFactsJson", () => {
  it("should print indented JSON", () => {
    expect(renderFactsJson({ kernel: "Linux" })).toBe('{\n  "kernel": "Linux"\n}');
  });
});
