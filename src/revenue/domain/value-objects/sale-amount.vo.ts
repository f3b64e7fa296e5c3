import { RejectionReason } from '../enums/rejection-reason.enum';

/** Fractional digits held exactly. Anything finer rounds half-up. */
export const SALE_AMOUNT_SCALE_DIGITS = 4;
const SCALE = 10n ** BigInt(SALE_AMOUNT_SCALE_DIGITS);

// Largest exponent accepted in `1.5e3` notation
const MAX_EXPONENT = 400;

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export type SaleAmountParseResult =
  | { ok: true; amount: SaleAmount }
  | { ok: false; reason: RejectionReason };

/**
 * Non-negative money value stored as a bigint count of 1/10000 units, so
 * sums stay exact at any size. The currency is whatever the caller's data uses.
 *
 * Numbers are read through their shortest decimal form (`String(0.1)` is
 * `"0.1"`), so `0.1 + 0.2` sums to exactly `0.3`.
 */
export class SaleAmount {
  readonly minorUnits: bigint;

  private constructor(minorUnits: bigint) {
    this.minorUnits = minorUnits;
  }

  static zero(): SaleAmount {
    return new SaleAmount(0n);
  }

  static parse(raw: unknown): SaleAmount {
    const result = SaleAmount.tryParse(raw);
    if (!result.ok) {
      throw new Error(`Invalid sale amount (${result.reason}): ${String(raw)}`);
    }
    return result.amount;
  }

  static isValid(raw: unknown): boolean {
    return SaleAmount.tryParse(raw).ok;
  }

  static tryParse(raw: unknown): SaleAmountParseResult {
    if (raw == null) {
      return { ok: false, reason: RejectionReason.MISSING_SALE_AMOUNT };
    }
    if (typeof raw === 'number') {
      if (!Number.isFinite(raw)) {
        return { ok: false, reason: RejectionReason.INVALID_SALE_AMOUNT };
      }
      if (raw < 0) {
        return { ok: false, reason: RejectionReason.NEGATIVE_SALE_AMOUNT };
      }
      return SaleAmount.fromDecimalString(String(raw));
    }
    if (typeof raw === 'string') {
      return SaleAmount.fromDecimalString(raw);
    }
    return { ok: false, reason: RejectionReason.INVALID_SALE_AMOUNT };
  }

  plus(other: SaleAmount): SaleAmount {
    return new SaleAmount(this.minorUnits + other.minorUnits);
  }

  /** Exact decimal form without trailing zeros, e.g. `"160.5"`. */
  toDecimalString(): string {
    const whole = this.minorUnits / SCALE;
    const fraction = this.minorUnits % SCALE;
    if (fraction === 0n) {
      return whole.toString();
    }
    const digits = fraction
      .toString()
      .padStart(SALE_AMOUNT_SCALE_DIGITS, '0')
      .replace(/0+$/, '');
    return `${whole}.${digits}`;
  }

  /** Nearest double to the exact value. */
  toNumber(): number {
    return Number(this.toDecimalString());
  }

  private static fromDecimalString(text: string): SaleAmountParseResult {
    const trimmed = text.trim();
    if (trimmed === '') {
      return { ok: false, reason: RejectionReason.MISSING_SALE_AMOUNT };
    }

    const match = DECIMAL_PATTERN.exec(trimmed);
    const sign = match?.[1] ?? '';
    const whole = match?.[2] ?? '';
    const fraction = match?.[3] ?? '';
    const exponent = Number(match?.[4] ?? '0');
    if (
      !match ||
      (whole === '' && fraction === '') ||
      Math.abs(exponent) > MAX_EXPONENT
    ) {
      return { ok: false, reason: RejectionReason.INVALID_SALE_AMOUNT };
    }

    const [integerDigits, fractionDigits] = shiftPoint(whole, fraction, exponent);
    const padded = fractionDigits.padEnd(SALE_AMOUNT_SCALE_DIGITS + 1, '0');
    const kept = padded.slice(0, SALE_AMOUNT_SCALE_DIGITS);
    const roundUp = padded.charCodeAt(SALE_AMOUNT_SCALE_DIGITS) >= '5'.charCodeAt(0);

    const minor = BigInt(`${integerDigits || '0'}${kept}`) + (roundUp ? 1n : 0n);
    if (sign === '-' && minor !== 0n) {
      return { ok: false, reason: RejectionReason.NEGATIVE_SALE_AMOUNT };
    }
    return { ok: true, amount: new SaleAmount(minor) };
  }
}

/** Moves the decimal point of `whole.fraction` by `exponent` places. */
function shiftPoint(
  whole: string,
  fraction: string,
  exponent: number,
): [string, string] {
  const digits = `${whole}${fraction}`;
  const pointAt = whole.length + exponent;

  if (pointAt <= 0) {
    // only the first digits past the point reach the rounding position
    const leadingZeros = Math.min(-pointAt, SALE_AMOUNT_SCALE_DIGITS + 1);
    return ['', `${'0'.repeat(leadingZeros)}${digits}`];
  }
  if (pointAt >= digits.length) {
    return [`${digits}${'0'.repeat(pointAt - digits.length)}`, ''];
  }
  return [digits.slice(0, pointAt), digits.slice(pointAt)];
}
