import { describe, it } from "mocha";
import { expect } from "chai";
import {
  applyNamingPolicy,
  resolveNamingPolicy,
} from "./naming-policy.js";
import type { NamingDefaults } from "./naming-policy.js";

describe("Naming policy", () => {
  describe("applyNamingPolicy", () => {
    it("should PascalCase words under clr", () => {
      expect(applyNamingPolicy("add_two", "clr")).to.equal("AddTwo");
      expect(applyNamingPolicy("parseHTTPHeader", "clr")).to.equal(
        "ParseHTTPHeader"
      );
      expect(applyNamingPolicy("utf8_len", "clr")).to.equal("Utf8Len");
    });

    it("should camelCase words under camel", () => {
      expect(applyNamingPolicy("add_two", "camel")).to.equal("addTwo");
      expect(applyNamingPolicy("OpaqueStruct", "camel")).to.equal(
        "opaqueStruct"
      );
      expect(applyNamingPolicy("HTTP_status", "camel")).to.equal("httpStatus");
    });

    it("should keep the native spelling under none", () => {
      expect(applyNamingPolicy("add_two", "none")).to.equal("add_two");
    });
  });

  describe("resolveNamingPolicy", () => {
    const defaults: NamingDefaults = {
      types: "clr",
      methods: "camel",
      fields: "camel",
      enumMembers: "clr",
      parameters: "camel",
    };

    it("should fall back to the backend defaults", () => {
      expect(resolveNamingPolicy(undefined, "methods", defaults)).to.equal(
        "camel"
      );
      expect(resolveNamingPolicy({}, "types", defaults)).to.equal("clr");
    });

    it("should let a bucket override its default", () => {
      expect(
        resolveNamingPolicy({ methods: "none" }, "methods", defaults)
      ).to.equal("none");
    });

    it("should let all override every bucket", () => {
      expect(
        resolveNamingPolicy({ all: "none", methods: "clr" }, "methods", defaults)
      ).to.equal("none");
    });
  });
});
