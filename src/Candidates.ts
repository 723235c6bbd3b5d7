import { isDigit } from './typeGuards.ts';

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * Immutable set of the digits still possible for a cell, kept in increasing order.
 *
 * An empty set marks a contradiction; a single digit marks a solved cell.
 */
export class Candidates {
  public static readonly ALL = new Candidates(DIGITS);
  public static readonly NONE = new Candidates([]);

  public get isEmpty(): boolean {
    return this.digits.length === 0;
  }

  public get isSolved(): boolean {
    return this.digits.length === 1;
  }

  public get size(): number {
    return this.digits.length;
  }

  /**
   * The digit of a solved cell, `null` otherwise.
   */
  public get value(): Digit | null {
    return this.isSolved ? this.digits[0] ?? null : null;
  }

  private readonly key: string;

  private constructor(public readonly digits: readonly Digit[]) {
    this.key = digits.join('');
  }

  public static of(...digits: Digit[]): Candidates {
    const unique = [...new Set(digits)].sort((a, b) => a - b);
    return new Candidates(unique);
  }

  /**
   * Parses a digit string such as `"139"`. Repeated digits collapse.
   */
  public static parse(text: string): Candidates {
    const digits: Digit[] = [];
    for (const ch of text) {
      const digit = Number(ch);
      if (!isDigit(digit)) {
        throw new Error(`Expected digits 1-9: ${text}`);
      }
      digits.push(digit);
    }
    return Candidates.of(...digits);
  }

  public equals(other: Candidates): boolean {
    return this.key === other.key;
  }

  public has(digit: Digit): boolean {
    return this.digits.includes(digit);
  }

  /**
   * Returns the set minus `removed`, or this same instance when nothing is removed.
   */
  public without(removed: Candidates): Candidates {
    const remaining = this.digits.filter((digit) => !removed.has(digit));
    return remaining.length === this.digits.length ? this : new Candidates(remaining);
  }

  public toString(): string {
    return this.key;
  }
}
