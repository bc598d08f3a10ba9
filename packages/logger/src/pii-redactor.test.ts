import { describe, it, expect } from "vitest";
import { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "pw")).toBe("[REDACTED]");
      expect(redactValue("apikey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("secretAccessKey", "test-secret")).toBe("[REDACTED]");
      expect(redactValue("cohereApiKey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("databaseUrl", "postgres://u:p@localhost/db")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "pw")).toBe("[REDACTED]");
      expect(redactValue("ACCESSKEYID", "test-id")).toBe("[REDACTED]");
    });

    it("redacts e-mail addresses in string values", () => {
      expect(redactValue("message", "Contact ops@example.com for details")).toBe(
        "Contact [REDACTED] for details",
      );
      expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    });

    it("redacts international phone numbers", () => {
      expect(redactValue("text", "Call +91 98470 12345 now")).toBe("Call [REDACTED] now");
    });

    it("leaves drawing numbers and amounts alone", () => {
      expect(redactValue("text", "Drawing 4471-220 rev B costs 125000")).toBe(
        "Drawing 4471-220 rev B costs 125000",
      );
    });

    it("does not modify non-string values for non-sensitive keys", () => {
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("active", true)).toBe(true);
      expect(redactValue("data", null)).toBe(null);
    });

    it("redacts consistently across repeated calls", () => {
      expect(redactValue("a", "x@y.io")).toBe("[REDACTED]");
      expect(redactValue("b", "x@y.io")).toBe("[REDACTED]");
    });
  });

  describe("redactRecord", () => {
    it("redacts every top-level property", () => {
      expect(
        redactRecord({ documentId: "doc-1", token: "t", recipients: "safety@example.com" }),
      ).toEqual({ documentId: "doc-1", token: "[REDACTED]", recipients: "[REDACTED]" });
    });
  });

  describe("REDACT_PATHS", () => {
    it("covers each sensitive key at top level and one level deep", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      expect(topLevel).toContain("secretAccessKey");
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
