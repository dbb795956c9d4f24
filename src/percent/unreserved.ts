function range(start: number, end: number): number[] {
  const out: number[] = [];
  for (let i = start; i <= end; i += 1) {
    out.push(i);
  }
  return out;
}

const UNRESERVED = new Set<number>([
  ...range(0x41, 0x5a),
  ...range(0x61, 0x7a),
  ...range(0x30, 0x39),
  0x2d,
  0x2e,
  0x5f,
  0x7e
]);

/** RFC 3986 section 2.3 unreserved set, tested by byte or code point value. */
export function isUnreservedCode(code: number): boolean {
  return UNRESERVED.has(code);
}

export function isUnreserved(character: string): boolean {
  const code = character.codePointAt(0);
  return character.length === 1 && code !== undefined && isUnreservedCode(code);
}

export function isHexDigit(character: string): boolean {
  return /^[0-9A-Fa-f]$/.test(character);
}
