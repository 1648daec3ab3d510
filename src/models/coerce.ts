import type { RawValue } from "#types";

/** Error for a field value present in a record but not numeric */
export class FieldCoercionError extends Error {
  readonly field: string;
  readonly value: RawValue;

  constructor(field: string, value: RawValue) {
    super(`Field "${field}" is not a number: ${JSON.stringify(value)}`);
    this.name = "FieldCoercionError";
    this.field = field;
    this.value = value;
  }
}

/**
 * Whether a raw value counts as present.
 * Empty strings, zero, false and null are treated as missing.
 */
export function isPresent(
  value: RawValue | undefined
): value is string | number | true {
  return Boolean(value);
}

// Decimal float text; underscores may only separate digits
const DECIMAL_FLOAT =
  /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:[eE][+-]?\d+(?:_\d+)*)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Coerce a raw value to a float, throwing when it is not numeric.
 * Only decimal notation is read; hex, octal and binary literals are rejected.
 */
export function toFloat(field: string, value: RawValue): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value === null) throw new FieldCoercionError(field, value);

  const text = value.trim();
  const special = SPECIAL_FLOAT.exec(text);
  if (special) {
    const [, sign, word = ""] = special;
    if (word.toLowerCase() === "nan") return NaN;
    return sign === "-" ? -Infinity : Infinity;
  }
  if (!DECIMAL_FLOAT.test(text)) {
    throw new FieldCoercionError(field, value);
  }
  return Number(text.replace(/_/g, ""));
}

/**
 * Coerce a raw value to a string, or return undefined when missing
 */
export function toText(value: RawValue | undefined): string | undefined {
  return isPresent(value) ? String(value) : undefined;
}
