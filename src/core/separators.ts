export const DEFAULT_SEPARATORS = " \t\n\r,.:;!?/-~()[]*'_{}`\"";

export function isSingleUnitAlphabet(alphabet: string): boolean {
  for (const ch of alphabet) {
    if (ch.length !== 1) return false;
  }
  return true;
}

export class SeparatorSet {
  private readonly chars: ReadonlySet<string>;

  private constructor(chars: ReadonlySet<string>) {
    this.chars = chars;
  }

  /** Separators are single UTF-16 code units; astral characters are rejected. */
  static from(alphabet: string): SeparatorSet {
    if (!isSingleUnitAlphabet(alphabet)) {
      throw new RangeError("Separators must be characters from the Basic Multilingual Plane");
    }
    return new SeparatorSet(new Set(alphabet));
  }

  get size(): number {
    return this.chars.size;
  }

  /** Tests the first character of `char`; the empty string is never a separator. */
  isSeparator(char: string): boolean {
    if (char.length === 0) return false;
    return this.chars.has(char.charAt(0));
  }
}

export function createSeparatorSet(alphabet: string = DEFAULT_SEPARATORS): SeparatorSet {
  return SeparatorSet.from(alphabet);
}
