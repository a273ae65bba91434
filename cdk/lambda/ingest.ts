// cdk/lambda/ingest.ts
import { randomUUID } from "node:crypto";
import type { IngestConfig } from "./config";
import type { Logger } from "./logger";
import { validateTelemetry, type ValidationError } from "./validate";
import { encodeArchiveBody, normalizeTelemetry } from "./normalize";
import { archiveKeyFor, type ArchiveWriter } from "./archive-store";
import type { StateWriter } from "./state-store";
import { TransientStoreError, toWriteFailure, type StoreFailureKind, type StoreWriteResult } from "./errors";

export interface StoreFailure {
  kind: StoreFailureKind;
  message: string;
}

export type IngestOutcome =
  | { status: "completed"; deviceId: string; archiveKey: string }
  | {
      status: "partially_failed";
      deviceId: string;
      stateOk: boolean;
      archiveOk: false;
      /** Which write failed. A failed state write means the archive was never attempted. */
      failedStep: "state" | "archive";
      failure: StoreFailure;
    }
  | { status: "rejected"; reason: ValidationError };

export interface IngestOptions {
  /** Epoch ms after which no store call may still be running. */
  deadlineAt?: number;
  requestId?: string;
}

export interface IngestionCoordinatorDeps {
  config: Pick<IngestConfig, "archivePrefix" | "decimalPlaces" | "storeTimeoutMs">;
  stateStore: StateWriter;
  archiveStore: ArchiveWriter;
  logger: Logger;
  now?: () => Date;
  newToken?: () => string;
}

export const randomToken = () => randomUUID().replace(/-/g, "").slice(0, 8);

/**
 * Runs one inbound event through validate, normalize, state write and
 * archive write. State is committed first: a failed state write stops the
 * event before the archive, a failed archive write leaves the new state in
 * place. Nothing is retried here; redelivery is the transport's business.
 */
export class IngestionCoordinator {
  private readonly now: () => Date;
  private readonly newToken: () => string;

  constructor(private readonly deps: IngestionCoordinatorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newToken = deps.newToken ?? randomToken;
  }

  async ingest(raw: unknown, options: IngestOptions = {}): Promise<IngestOutcome> {
    const { config, stateStore, archiveStore } = this.deps;
    const log = options.requestId ? this.deps.logger.child({ request_id: options.requestId }) : this.deps.logger;

    const validation = validateTelemetry(raw);
    if (!validation.ok) {
      log.warn({ reason: validation.error.code }, validation.error.message);
      return { status: "rejected", reason: validation.error };
    }

    const event = normalizeTelemetry(validation.event, config.decimalPlaces);
    const deviceId = event.device_id;
    const deviceLog = log.child({ device_id: deviceId });

    const receivedAt = this.now();
    const stateResult = await this.boundedWrite(() => stateStore.upsert(event, receivedAt), options.deadlineAt);
    if (!stateResult.ok) {
      deviceLog.error({ kind: stateResult.kind, err: stateResult.message }, "state write failed, archive skipped");
      return {
        status: "partially_failed",
        deviceId,
        stateOk: false,
        archiveOk: false,
        failedStep: "state",
        failure: { kind: stateResult.kind, message: stateResult.message },
      };
    }

    const archiveKey = archiveKeyFor(event, this.newToken(), config.archivePrefix);
    const body = encodeArchiveBody(event);
    // S3 user metadata travels as HTTP headers
    const metadata = { device_id: encodeURIComponent(deviceId), ingested_at: receivedAt.toISOString() };
    const archiveResult = await this.boundedWrite(
      () => archiveStore.append(archiveKey, body, metadata),
      options.deadlineAt
    );
    if (!archiveResult.ok) {
      deviceLog.warn(
        { kind: archiveResult.kind, err: archiveResult.message, archive_key: archiveKey },
        "archive write failed after state write"
      );
      return {
        status: "partially_failed",
        deviceId,
        stateOk: true,
        archiveOk: false,
        failedStep: "archive",
        failure: { kind: archiveResult.kind, message: archiveResult.message },
      };
    }

    deviceLog.info({ archive_key: archiveKey }, "telemetry stored");
    return { status: "completed", deviceId, archiveKey };
  }

  private async boundedWrite(write: () => Promise<StoreWriteResult>, deadlineAt?: number): Promise<StoreWriteResult> {
    let budget = this.deps.config.storeTimeoutMs;
    if (deadlineAt !== undefined) {
      budget = Math.min(budget, deadlineAt - this.now().getTime());
    }
    if (budget <= 0) {
      return toWriteFailure(new TransientStoreError("invocation deadline reached before store call"));
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<StoreWriteResult>((resolve) => {
      timer = setTimeout(
        () => resolve(toWriteFailure(new TransientStoreError(`store call timed out after ${budget}ms`))),
        budget
      );
    });
    try {
      return await Promise.race([write(), timeout]);
    } catch (err) {
      return toWriteFailure(err);
    } finally {
      clearTimeout(timer);
    }
  }
}
