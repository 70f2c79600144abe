import { describe, expect, it } from "vitest";
import {
  deriveSessionToken,
  hashPassword,
  sha256Hex,
  verifyPasswordHash,
} from "@/lib/security/digest";

describe("digest", () => {
  it("sha256Hex matches the known digest of an empty string", () => {
    expect(sha256Hex("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("sha256Hex matches the known digest of 'abc'", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("hashPassword is a plain SHA-256 hex digest", () => {
    expect(hashPassword("abc")).toBe(sha256Hex("abc"));
  });

  describe("verifyPasswordHash", () => {
    it("accepts the matching password", () => {
      expect(verifyPasswordHash("test-password", hashPassword("test-password"))).toBe(true);
    });

    it("rejects a different password", () => {
      expect(verifyPasswordHash("test-password", hashPassword("other-password"))).toBe(false);
    });

    it("rejects a stored hash of a different length", () => {
      expect(verifyPasswordHash("test-password", "abc")).toBe(false);
      expect(verifyPasswordHash("test-password", "")).toBe(false);
    });

    it("is case sensitive on the stored hex", () => {
      expect(verifyPasswordHash("abc", hashPassword("abc").toUpperCase())).toBe(false);
    });
  });

  describe("deriveSessionToken", () => {
    it("hashes userId and timestamp", () => {
      expect(deriveSessionToken(7, "1700000000000.42")).toBe(sha256Hex("7_1700000000000.42"));
    });

    it("appends the attempt number after a collision", () => {
      expect(deriveSessionToken(7, "1700000000000.42", 2)).toBe(
        sha256Hex("7_1700000000000.42_2")
      );
    });

    it("differs per user at the same timestamp", () => {
      expect(deriveSessionToken(1, "100")).not.toBe(deriveSessionToken(2, "100"));
    });
  });
});
