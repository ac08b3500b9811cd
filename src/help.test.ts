import { describe, expect, test } from "vitest";
import { formatHelp, wrapText } from "./help.js";
import { ClargParser } from "./index.js";

describe("wrapText", () => {
  test("breaks between words", () => {
    expect(wrapText("the quick brown fox jumps", 10)).toEqual(["the quick", "brown fox", "jumps"]);
  });

  test("gives an over-long word its own line", () => {
    expect(wrapText("a extraordinarily b", 5)).toEqual(["a", "extraordinarily", "b"]);
  });

  test("collapses runs of whitespace", () => {
    expect(wrapText("  one \n two  ", 20)).toEqual(["one two"]);
  });

  test("returns one empty line for empty text", () => {
    expect(wrapText("", 10)).toEqual([""]);
  });
});

describe("Help text", () => {
  test("lays out every entry kind", () => {
    const parser = new ClargParser({ args: [] });
    parser.addSeparator("General:");
    parser.addOption("-s", "--string", "A string", false, "hello");
    parser.addToggle("-v", "--verbose", "Enables verbose output");
    parser.addMultiOption("-m", "--mode", "Select the mode", ["auto", "manual"], "auto");
    parser.addPositionalOption("-i", "--input", "Input file", true);
    parser.parseOptions();

    expect(parser.getHelp({ name: "demo" })).toBe(
      [
        "USAGE",
        "  $ demo [options] <input>",
        "",
        "OPTIONS",
        "General:",
        "  [-s] --string  ( hello) : A string",
        "  [-v] --verbose ( false) : Enables verbose output",
        "  [-m] --mode    (  auto) : Select the mode (choices: auto|manual)",
        "  [-i] --input   (      ) : Input file (required)",
      ].join("\n"),
    );
  });

  test("starts with the program description", () => {
    const parser = new ClargParser({ args: [] });
    parser.addToggle("-q", "--quiet", "Quiet");

    expect(parser.getHelp({ description: "Test App" }).split("\n").slice(0, 4)).toEqual([
      "Test App",
      "",
      "USAGE",
      "  $ cli [options]",
    ]);
  });

  test("separates groups with a blank line", () => {
    const parser = new ClargParser({ args: [] });
    parser.addToggle("-a", "--all", "All");
    parser.addSeparator("Output:");
    parser.addToggle("-q", "--quiet", "Quiet");

    expect(parser.getHelp().split("\n").slice(-4)).toEqual([
      "  [-a] --all   (false) : All",
      "",
      "Output:",
      "  [-q] --quiet (false) : Quiet",
    ]);
  });

  test("omits the short column when no entry has a short name", () => {
    const parser = new ClargParser({ args: [] });
    parser.addToggle("", "--quiet", "Quiet");
    expect(parser.getHelp().split("\n").at(-1)).toBe("  --quiet (false) : Quiet");
  });

  test("names optional positionals and lists in the usage line", () => {
    const parser = new ClargParser({ args: [] });
    parser.addPositionalOption("-o", "--output", "Output file");
    parser.addPositionalList("-f", "", "Files", true);
    expect(parser.getHelp().split("\n")[1]).toBe("  $ cli [output] <f...>");
  });

  test("wraps long descriptions under the description column", () => {
    const parser = new ClargParser({ args: [] });
    parser.addOption("-s", "--short", "alpha beta gamma delta epsilon zeta eta theta", false, "v");

    expect(parser.getHelp({ width: 50 }).split("\n").slice(-2)).toEqual([
      "  [-s] --short (v) : alpha beta gamma delta",
      `${" ".repeat(21)}epsilon zeta eta theta`,
    ]);
  });

  test("leaves descriptions whole when the column is too narrow", () => {
    const parser = new ClargParser({ args: [] });
    parser.addOption("-s", "--short", "alpha beta gamma delta", false, "v");
    expect(parser.getHelp({ width: 30 }).split("\n").at(-1)).toBe("  [-s] --short (v) : alpha beta gamma delta");
  });

  test("shows resolved values", () => {
    const parser = new ClargParser({ args: ["x", "yy"] });
    parser.addPositionalList("-f", "--files", "Files");
    parser.parseOptions();
    expect(parser.getHelp().split("\n").at(-1)).toBe("  [-f] --files (x, yy) : Files");
  });

  test("styles output on request", () => {
    const parser = new ClargParser({ args: [] });
    parser.addToggle("-q", "--quiet", "Quiet");
    const help = formatHelp(parser.describe(), { color: true });

    expect(help).toContain("\x1b[1mUSAGE\x1b[0m");
    expect(help).toContain("[\x1b[33m-q\x1b[0m] \x1b[33m--quiet\x1b[0m (\x1b[90mfalse\x1b[0m) : Quiet");
  });
});
