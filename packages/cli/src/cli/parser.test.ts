/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
        expect(result.files).to.deep.equal([]);
      });

      it("should collect source files after the command", () => {
        const result = parseArgs(["annotate", "a.ts", "b.ts"]);
        expect(result.command).to.equal("annotate");
        expect(result.files).to.deep.equal(["a.ts", "b.ts"]);
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
      });

      it("should parse help command from -h after a command", () => {
        const result = parseArgs(["check", "-h"]);
        expect(result.command).to.equal("help");
        expect(result.options).to.deep.equal({});
      });

      it("should parse version command from -v", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should return an empty command for no arguments", () => {
        expect(parseArgs([]).command).to.equal("");
      });
    });

    describe("Options", () => {
      it("should parse flags", () => {
        const result = parseArgs([
          "check",
          "--verbose",
          "-q",
          "--fail-on-warnings",
        ]);
        expect(result.options).to.deep.equal({
          verbose: true,
          quiet: true,
          failOnWarnings: true,
        });
      });

      it("should parse options taking a value", () => {
        const result = parseArgs([
          "check",
          "-c",
          "conf/lifthook.json",
          "--src",
          "src",
          "main.ts",
        ]);
        expect(result.options.config).to.equal("conf/lifthook.json");
        expect(result.options.src).to.equal("src");
        expect(result.files).to.deep.equal(["main.ts"]);
      });

      it("should use an empty value when an option value is missing", () => {
        expect(parseArgs(["check", "--config"]).options.config).to.equal("");
      });

      it("should report an unknown option", () => {
        const result = parseArgs(["check", "-V", "--emit"]);
        expect(result.command).to.equal("unknown-option");
        expect(result.files).to.deep.equal(["--emit"]);
        expect(result.options.verbose).to.equal(true);
      });
    });
  });
});
