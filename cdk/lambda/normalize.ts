// cdk/lambda/normalize.ts
import type { TelemetryEvent } from "./validate";

const DECIMAL_TEXT = /^([+-]?)(\d+)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Exact decimal with a fixed number of fractional digits, stored as an
 * unscaled integer. DynamoDB numbers are written from `toString()` so the
 * stored value is exactly what was rounded here.
 */
export class FixedPoint {
  private constructor(
    readonly unscaled: bigint,
    readonly scale: number
  ) {}

  /**
   * Rounds half-to-even at `scale` digits. Numbers are rounded from their
   * shortest decimal text, so 2.675 becomes 2.68 rather than following the
   * binary value.
   */
  static from(value: number | string | FixedPoint, scale: number): FixedPoint {
    if (!Number.isInteger(scale) || scale < 0) {
      throw new RangeError(`scale must be a non-negative integer, got ${scale}`);
    }
    if (value instanceof FixedPoint) {
      return value.scale === scale ? value : FixedPoint.from(value.toString(), scale);
    }
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new RangeError(`cannot represent ${value} as a fixed-point decimal`);
    }

    const text = typeof value === "number" ? String(value) : value.trim();
    const m = DECIMAL_TEXT.exec(text);
    if (!m) throw new RangeError(`not a decimal number: '${text}'`);

    const [, sign, intPart, fracPart = "", expPart = "0"] = m;
    const digits = BigInt(intPart + fracPart);
    const shift = Number(expPart) - fracPart.length + scale;

    let unscaled: bigint;
    if (shift >= 0) {
      unscaled = digits * 10n ** BigInt(shift);
    } else {
      const divisor = 10n ** BigInt(-shift);
      unscaled = digits / divisor;
      const twiceRemainder = (digits % divisor) * 2n;
      if (twiceRemainder > divisor || (twiceRemainder === divisor && unscaled % 2n === 1n)) {
        unscaled += 1n;
      }
    }
    return new FixedPoint(sign === "-" ? -unscaled : unscaled, scale);
  }

  equals(other: FixedPoint): boolean {
    return this.unscaled === other.unscaled && this.scale === other.scale;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    const negative = this.unscaled < 0n;
    const abs = (negative ? -this.unscaled : this.unscaled).toString().padStart(this.scale + 1, "0");
    const body = this.scale === 0 ? abs : `${abs.slice(0, -this.scale)}.${abs.slice(-this.scale)}`;
    return negative ? `-${body}` : body;
  }

  toJSON(): number {
    return this.toNumber();
  }
}

export type NormalizedTelemetry = Omit<TelemetryEvent, "temperature" | "humidity"> & {
  temperature: FixedPoint;
  humidity: FixedPoint;
};

type NormalizerInput = Omit<TelemetryEvent, "temperature" | "humidity"> & {
  temperature: number | FixedPoint;
  humidity: number | FixedPoint;
};

/** Converts sensor decimals to the state store's precision. Idempotent. */
export function normalizeTelemetry(event: NormalizerInput, scale: number): NormalizedTelemetry {
  return {
    ...event,
    temperature: FixedPoint.from(event.temperature, scale),
    humidity: FixedPoint.from(event.humidity, scale),
  };
}

export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | FixedPoint
  | CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

/**
 * Deterministic JSON: keys sorted, no whitespace, fixed-point values as
 * number literals with their trailing zeros. Undefined object members are
 * omitted as JSON.stringify does.
 */
export function canonicalJson(value: CanonicalValue): string {
  if (value instanceof FixedPoint) return value.toString();
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) {
    return `[${value.map((item: CanonicalValue) => canonicalJson(item)).join(",")}]`;
  }
  if (typeof value === "object") {
    const record = value;
    const members = Object.keys(record)
      .sort()
      .filter((key) => record[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(record[key])}`);
    return `{${members.join(",")}}`;
  }
  if (typeof value === "number" && !Number.isFinite(value)) return "null";
  return JSON.stringify(value);
}

export function encodeArchiveBody(event: NormalizedTelemetry): Uint8Array {
  return new TextEncoder().encode(canonicalJson(event));
}
