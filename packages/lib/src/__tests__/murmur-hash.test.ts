import { describe, expect, test } from "vitest";
import { murmurHash3 } from "../murmur-hash.js";

describe("murmurHash3", () => {
  test("hashes the empty string to zero", () => {
    expect(murmurHash3("")).toBe(0);
  });

  test("hashes a short string with a partial block", () => {
    expect(murmurHash3("abc")).toBe(3017643002);
  });

  test("hashes a longer string", () => {
    expect(murmurHash3("The quick brown fox jumps over the lazy dog")).toBe(
      776992547,
    );
  });

  test("hashes whole blocks only", () => {
    expect(murmurHash3("1234567890")).toBe(839148365);
  });

  test("honors the seed", () => {
    expect(murmurHash3("seeded", 123)).toBe(1693092115);
  });

  test("distinguishes different inputs", () => {
    expect(murmurHash3("input1")).not.toBe(murmurHash3("input2"));
  });
});
