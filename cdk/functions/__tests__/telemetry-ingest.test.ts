import { describe, expect, test } from "vitest";
import { createIngestHandler, toResponse } from "../telemetry-ingest";
import { IngestionCoordinator, type IngestOptions } from "../../lambda/ingest";
import { silentLogger } from "../../lambda/logger";
import { InMemoryArchiveStore, InMemoryStateStore, validPayload } from "../../lambda/__tests__/fakes";

const context = (remainingMs = 5000) => ({
  awsRequestId: "req-1",
  getRemainingTimeInMillis: () => remainingMs,
});

function runtimeWith(state = new InMemoryStateStore(), archive = new InMemoryArchiveStore()) {
  const coordinator = new IngestionCoordinator({
    config: { archivePrefix: "telemetry", decimalPlaces: 2, storeTimeoutMs: 1000 },
    stateStore: state,
    archiveStore: archive,
    logger: silentLogger,
    newToken: () => "0badcafe",
  });
  return { coordinator, config: { deadlineMarginMs: 250 }, logger: silentLogger };
}

describe("telemetry ingest handler", () => {
  test("responds 200 when both writes succeed", async () => {
    const handler = createIngestHandler(runtimeWith());
    const res = await handler(validPayload(), context());

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({
      message: "Telemetry processed successfully",
      device_id: "station-01",
      state_ok: true,
      archive_ok: true,
      archive_key: "telemetry/year=2024/month=01/day=15/station-01_20240115_142345_0badcafe.json",
    });
  });

  test("responds 207 when only the archive failed", async () => {
    const archive = new InMemoryArchiveStore();
    archive.failWith = "transient_unavailable";
    const res = await createIngestHandler(runtimeWith(undefined, archive))(validPayload(), context());

    expect(res.statusCode).toBe(207);
    expect(JSON.parse(res.body)).toEqual({
      message: "Telemetry partially processed",
      device_id: "station-01",
      state_ok: true,
      archive_ok: false,
      failure: "transient_unavailable",
    });
  });

  test("responds 500 when the state write failed", async () => {
    const state = new InMemoryStateStore();
    state.failWith = "capacity_exceeded";
    const res = await createIngestHandler(runtimeWith(state))(validPayload(), context());

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body).state_ok).toBe(false);
  });

  test("responds 400 with the rejection code", async () => {
    const res = await createIngestHandler(runtimeWith())({ device_id: "station-01" }, context());

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({
      error: "Validation failed",
      reason: "missing_field:battery_available",
      message: "Missing required field: battery_available",
    });
  });

  test("passes the invocation deadline minus the margin", async () => {
    let seen: IngestOptions | undefined;
    const handler = createIngestHandler({
      coordinator: {
        ingest: async (_raw, options) => {
          seen = options;
          return { status: "completed", deviceId: "station-01", archiveKey: "k" };
        },
      },
      config: { deadlineMarginMs: 250 },
      logger: silentLogger,
    });

    const before = Date.now();
    await handler(validPayload(), context(3000));

    expect(seen?.requestId).toBe("req-1");
    expect(seen?.deadlineAt).toBeGreaterThanOrEqual(before + 2750);
    expect(seen?.deadlineAt).toBeLessThanOrEqual(Date.now() + 2750);
  });

  test("never throws out of the handler", async () => {
    const handler = createIngestHandler({
      coordinator: {
        ingest: async () => {
          throw new Error("bug");
        },
      },
      config: { deadlineMarginMs: 0 },
      logger: silentLogger,
    });

    const res = await handler(validPayload(), context());
    expect(res).toEqual({ statusCode: 500, body: '{"error":"Internal server error"}' });
  });
});

describe("toResponse", () => {
  test("reports archive failures as partial success", () => {
    expect(
      toResponse({
        status: "partially_failed",
        deviceId: "d",
        stateOk: true,
        archiveOk: false,
        failedStep: "archive",
        failure: { kind: "capacity_exceeded", message: "SlowDown" },
      }).statusCode
    ).toBe(207);
  });
});
