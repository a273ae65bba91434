// cdk/lambda/validate.ts
import { z } from "zod";

export const STATION_STATUSES = ["operational", "maintenance", "offline"] as const;
export type StationStatus = (typeof STATION_STATUSES)[number];

const ISO_INSTANT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))$/;

/** Parses an ISO-8601 instant carrying `Z` or a numeric offset. */
export function parseInstant(value: string): Date | undefined {
  const m = ISO_INSTANT.exec(value);
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return undefined;
  // rejects 2024-02-30 and friends
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) return undefined;
  if (m[9] !== undefined && (Number(m[9]) > 23 || Number(m[10]) > 59)) return undefined;

  const instant = new Date(value);
  return Number.isNaN(instant.getTime()) ? undefined : instant;
}

const instant = z.string().refine((value) => parseInstant(value) !== undefined, "must be an ISO-8601 instant");

// Field order here is the order fields are checked in; the first failure wins.
export const telemetrySchema = z.object({
  device_id: z.string().refine((value) => value.trim().length > 0, "must be a non-empty string"),
  battery_available: z.number().int(),
  battery_charging: z.number().int(),
  temperature: z.number().finite(),
  humidity: z.number().finite(),
  status: z.enum(STATION_STATUSES),
  timestamp: instant,
  total_swaps_today: z.number().int().optional(),
  last_swap_time: instant.optional(),
});

export type TelemetryEvent = z.infer<typeof telemetrySchema>;

const REQUIRED_FIELDS = new Set<string>([
  "device_id",
  "battery_available",
  "battery_charging",
  "temperature",
  "humidity",
  "status",
  "timestamp",
]);

const TIMESTAMP_FIELDS = new Set<string>(["timestamp", "last_swap_time"]);

export type ValidationErrorKind = "missing_field" | "wrong_type" | "malformed_timestamp" | "malformed_payload";

export interface ValidationError {
  kind: ValidationErrorKind;
  field: string;
  /** `{kind}:{field}`, e.g. `missing_field:timestamp` */
  code: string;
  message: string;
}

export type ValidationResult = { ok: true; event: TelemetryEvent } | { ok: false; error: ValidationError };

function validationError(kind: ValidationErrorKind, field: string, message: string): ValidationError {
  return { kind, field, code: `${kind}:${field}`, message };
}

function toValidationError(issue: z.ZodIssue): ValidationError {
  const field = issue.path.length > 0 ? String(issue.path[0]) : "payload";

  if (issue.code === z.ZodIssueCode.invalid_type) {
    const absent = issue.received === z.ZodParsedType.undefined || issue.received === z.ZodParsedType.null;
    if (absent && REQUIRED_FIELDS.has(field)) {
      return validationError("missing_field", field, `Missing required field: ${field}`);
    }
    return validationError("wrong_type", field, `${field} must be ${issue.expected}, got ${issue.received}`);
  }

  if (TIMESTAMP_FIELDS.has(field)) {
    return validationError("malformed_timestamp", field, `${field} must be a valid ISO-8601 instant`);
  }
  return validationError("wrong_type", field, `${field}: ${issue.message}`);
}

/**
 * Decodes an inbound message body. IoT rules hand the Lambda a parsed
 * object, but a raw string or byte payload is accepted too.
 */
export function decodeMessage(raw: unknown): Record<string, unknown> | undefined {
  let value = raw;
  try {
    if (raw instanceof Uint8Array) {
      value = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(raw));
    } else if (typeof raw === "string") {
      value = JSON.parse(raw);
    }
  } catch {
    return undefined;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

/**
 * Checks presence and type of every telemetry field. No range or
 * cross-field checks: a negative battery count is accepted as sent.
 */
export function validateTelemetry(raw: unknown): ValidationResult {
  const message = decodeMessage(raw);
  if (!message) {
    return {
      ok: false,
      error: validationError("malformed_payload", "payload", "Payload must be a JSON object"),
    };
  }

  const parsed = telemetrySchema.safeParse(message);
  if (!parsed.success) {
    return { ok: false, error: toValidationError(parsed.error.issues[0]) };
  }
  return { ok: true, event: parsed.data };
}
