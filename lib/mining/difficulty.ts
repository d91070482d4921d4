/**
 * Difficulty validation
 *
 * The first 4 bytes of the hash are read as a big-endian u32. Every bit that is
 * zero in the difficulty mask must also be zero in that prefix:
 *   (left4 & ~mask) === 0
 */

const HEX_RE = /^[0-9a-fA-F]+$/;

function parseU32(hex: string): number | null {
  if (hex.length === 0 || hex.length > 8 || !HEX_RE.test(hex)) {
    return null;
  }
  return parseInt(hex, 16) >>> 0;
}

/**
 * Check a hash against a difficulty mask. Malformed input never passes.
 */
export function matchesDifficulty(hashHex: string, difficultyHex: string): boolean {
  if (typeof hashHex !== 'string' || hashHex.length < 8) {
    return false;
  }

  const left4 = parseU32(hashHex.slice(0, 8));
  const mask = parseU32(difficultyHex);
  if (left4 === null || mask === null) {
    return false;
  }

  return ((left4 & ~mask) >>> 0) === 0;
}

/**
 * Get number of leading zero bits required by a difficulty mask
 * Only used for log output; invalid masks report 0
 */
export function getDifficultyZeroBits(difficultyHex: string): number {
  const mask = parseU32(difficultyHex);
  if (mask === null) {
    return 0;
  }
  return Math.clz32(mask);
}
