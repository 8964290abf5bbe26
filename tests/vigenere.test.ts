import { describe, it, expect } from "vitest";
import { encrypt, decrypt, normalizeCipherText } from "../src/sim/vigenere.js";

describe("vigenere", () => {
  it("encrypts letters and skips spaces without advancing the key", () => {
    expect(encrypt("HELLO WORLD", "KEY")).toBe("RIJVS UYVJN");
    expect(decrypt("RIJVS UYVJN", "KEY")).toBe("HELLO WORLD");
  });

  it("uppercases plaintext and key", () => {
    expect(encrypt("attack at dawn", "lemon")).toBe("LXFOPV EF RNHR");
  });

  it("wraps around the alphabet in both directions", () => {
    expect(encrypt("Z", "B")).toBe("A");
    expect(decrypt("A", "B")).toBe("Z");
  });

  it("passes punctuation through", () => {
    expect(encrypt("HI, YOU!", "B")).toBe("IJ, ZPV!");
  });

  it("yields nothing for an empty key", () => {
    expect(encrypt("HELLO", "")).toBe("");
    expect(decrypt("HELLO", "")).toBe("");
  });

  it("normalizes answers by dropping whitespace and case", () => {
    expect(normalizeCipherText(" hello  World\n")).toBe("HELLOWORLD");
  });
});
