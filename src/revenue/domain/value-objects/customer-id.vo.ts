export class CustomerId {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Accepts a non-empty string (trimmed) or an integer number. Integers are
   * normalised to their decimal form, so `1001` and `"1001"` are the same id.
   */
  static parse(raw: unknown): CustomerId {
    const normalized = CustomerId.normalize(raw);
    if (normalized === null) {
      throw new Error(`Invalid customer id: ${String(raw)}`);
    }
    return new CustomerId(normalized);
  }

  static isValid(raw: unknown): boolean {
    return CustomerId.normalize(raw) !== null;
  }

  static isMissing(raw: unknown): boolean {
    return raw == null || (typeof raw === 'string' && raw.trim() === '');
  }

  equals(other: CustomerId): boolean {
    return this.value === other.value;
  }

  private static normalize(raw: unknown): string | null {
    if (typeof raw === 'string') {
      const trimmed = raw.trim();
      return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
      // -0 prints as "0"
      return String(raw);
    }
    return null;
  }
}
