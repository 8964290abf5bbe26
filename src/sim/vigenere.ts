/**
 * Vigenère cipher over A–Z (A=0 … Z=25).
 * Letters are uppercased; anything else passes through and does not advance the key.
 */

const A = "A".charCodeAt(0);

function isLetter(ch: string): boolean {
  return ch >= "A" && ch <= "Z";
}

function shift(text: string, key: string, direction: 1 | -1): string {
  const upperKey = key.toUpperCase();
  if (upperKey.length === 0) return "";

  let keyIdx = 0;
  let out = "";
  for (const ch of text.toUpperCase()) {
    if (!isLetter(ch)) {
      out += ch;
      continue;
    }
    const k = upperKey.charCodeAt(keyIdx % upperKey.length) - A;
    const value = (((ch.charCodeAt(0) - A + direction * k) % 26) + 26) % 26;
    out += String.fromCharCode(value + A);
    keyIdx++;
  }
  return out;
}

export function encrypt(plaintext: string, key: string): string {
  return shift(plaintext, key, 1);
}

export function decrypt(ciphertext: string, key: string): string {
  return shift(ciphertext, key, -1);
}

/** Strip all whitespace and uppercase, for comparing answers. */
export function normalizeCipherText(input: string): string {
  return input.replace(/\s+/g, "").toUpperCase();
}
