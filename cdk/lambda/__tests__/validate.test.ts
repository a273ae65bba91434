import { describe, test, expect } from "vitest";
import { parseInstant, validateTelemetry } from "../validate";
import { validPayload } from "./fakes";

function rejectionCode(raw: unknown): string | undefined {
  const result = validateTelemetry(raw);
  return result.ok ? undefined : result.error.code;
}

describe("validateTelemetry", () => {
  test("accepts a complete event", () => {
    const result = validateTelemetry(validPayload());
    expect(result).toEqual({ ok: true, event: validPayload() });
  });

  test("accepts a JSON string payload", () => {
    const result = validateTelemetry(JSON.stringify(validPayload()));
    expect(result.ok).toBe(true);
  });

  test("accepts UTF-8 bytes", () => {
    const result = validateTelemetry(new TextEncoder().encode(JSON.stringify(validPayload())));
    expect(result.ok).toBe(true);
  });

  test("drops unknown fields", () => {
    const result = validateTelemetry({ ...validPayload(), firmware: "1.2.3" });
    expect(result.ok && "firmware" in result.event).toBe(false);
  });

  test("keeps optional simulator counters", () => {
    const result = validateTelemetry({
      ...validPayload(),
      total_swaps_today: 7,
      last_swap_time: "2024-01-15T14:00:00.123Z",
    });
    expect(result.ok && result.event.total_swaps_today).toBe(7);
  });

  test.each([
    "device_id",
    "battery_available",
    "battery_charging",
    "temperature",
    "humidity",
    "status",
    "timestamp",
  ])("missing %s is reported by name", (field) => {
    const payload: Record<string, unknown> = validPayload();
    delete payload[field];
    expect(rejectionCode(payload)).toBe(`missing_field:${field}`);
  });

  test("null counts as missing", () => {
    expect(rejectionCode({ ...validPayload(), humidity: null })).toBe("missing_field:humidity");
  });

  test("the first failing field in declaration order wins", () => {
    const payload: Record<string, unknown> = { ...validPayload(), status: 3 };
    delete payload.timestamp;
    expect(rejectionCode(payload)).toBe("wrong_type:status");
  });

  test.each([
    { field: "device_id", value: 42 },
    { field: "device_id", value: "   " },
    { field: "battery_available", value: "12" },
    { field: "battery_charging", value: 4.5 },
    { field: "temperature", value: "28.5" },
    { field: "humidity", value: true },
    { field: "status", value: "exploded" },
    { field: "timestamp", value: 1705328625 },
    { field: "total_swaps_today", value: null },
  ])("$field = $value is a wrong type", ({ field, value }) => {
    expect(rejectionCode({ ...validPayload(), [field]: value })).toBe(`wrong_type:${field}`);
  });

  test.each(["2024-01-15", "2024-01-15T14:23:45", "2024-02-30T00:00:00Z", "2024-01-15T25:00:00Z", "yesterday"])(
    "timestamp %s is malformed",
    (timestamp) => {
      expect(rejectionCode({ ...validPayload(), timestamp })).toBe("malformed_timestamp:timestamp");
    }
  );

  test("malformed last_swap_time is reported against that field", () => {
    expect(rejectionCode({ ...validPayload(), last_swap_time: "noon" })).toBe("malformed_timestamp:last_swap_time");
  });

  test("performs no range checks", () => {
    const result = validateTelemetry({
      ...validPayload(),
      battery_available: -3,
      temperature: -273.5,
      humidity: 140,
    });
    expect(result.ok).toBe(true);
  });

  test.each([["not json"], [[1, 2]], [null], [17]])("payload %j is malformed", (raw) => {
    expect(rejectionCode(raw)).toBe("malformed_payload:payload");
  });

  test("rejection carries a readable message", () => {
    const payload: Record<string, unknown> = validPayload();
    delete payload.timestamp;
    const result = validateTelemetry(payload);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "missing_field",
        field: "timestamp",
        code: "missing_field:timestamp",
        message: "Missing required field: timestamp",
      },
    });
  });
});

describe("parseInstant", () => {
  test("honours numeric offsets", () => {
    expect(parseInstant("2024-01-15T01:30:00+02:00")?.toISOString()).toBe("2024-01-14T23:30:00.000Z");
  });

  test("accepts leap days", () => {
    expect(parseInstant("2024-02-29T12:00:00Z")?.toISOString()).toBe("2024-02-29T12:00:00.000Z");
  });

  test("rejects out-of-range offsets", () => {
    expect(parseInstant("2024-01-15T01:30:00+25:00")).toBeUndefined();
  });
});
