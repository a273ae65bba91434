// cdk/functions/telemetry-ingest.ts
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { S3Client } from "@aws-sdk/client-s3";
import type { Context } from "aws-lambda";
import { loadIngestConfig, type IngestConfig } from "../lambda/config";
import { createLogger, type Logger } from "../lambda/logger";
import { IngestionCoordinator, type IngestOutcome } from "../lambda/ingest";
import { DynamoStateStore } from "../lambda/state-store";
import { S3ArchiveStore } from "../lambda/archive-store";

export interface IngestResponse {
  statusCode: number;
  body: string;
}

export interface IngestRuntime {
  coordinator: Pick<IngestionCoordinator, "ingest">;
  config: Pick<IngestConfig, "deadlineMarginMs">;
  logger: Logger;
}

type InvocationContext = Pick<Context, "awsRequestId" | "getRemainingTimeInMillis">;

export function toResponse(outcome: IngestOutcome): IngestResponse {
  switch (outcome.status) {
    case "rejected":
      return {
        statusCode: 400,
        body: JSON.stringify({
          error: "Validation failed",
          reason: outcome.reason.code,
          message: outcome.reason.message,
        }),
      };
    case "completed":
      return {
        statusCode: 200,
        body: JSON.stringify({
          message: "Telemetry processed successfully",
          device_id: outcome.deviceId,
          state_ok: true,
          archive_ok: true,
          archive_key: outcome.archiveKey,
        }),
      };
    case "partially_failed":
      return {
        // 207: state is fresh, the archive is missing this event
        statusCode: outcome.stateOk ? 207 : 500,
        body: JSON.stringify({
          message: outcome.stateOk ? "Telemetry partially processed" : "Failed to process telemetry",
          device_id: outcome.deviceId,
          state_ok: outcome.stateOk,
          archive_ok: outcome.archiveOk,
          failure: outcome.failure.kind,
        }),
      };
  }
}

export function createIngestHandler(runtime: IngestRuntime) {
  return async (event: unknown, context: InvocationContext): Promise<IngestResponse> => {
    try {
      const deadlineAt = Date.now() + context.getRemainingTimeInMillis() - runtime.config.deadlineMarginMs;
      const outcome = await runtime.coordinator.ingest(event, {
        deadlineAt,
        requestId: context.awsRequestId,
      });
      return toResponse(outcome);
    } catch (err) {
      runtime.logger.error({ err, request_id: context.awsRequestId }, "unexpected error in ingest handler");
      return {
        statusCode: 500,
        body: JSON.stringify({ error: "Internal server error" }),
      };
    }
  };
}

// Built on first invocation and reused while the container stays warm
let runtime: IngestRuntime | undefined;

function getRuntime(): IngestRuntime {
  if (!runtime) {
    const config = loadIngestConfig();
    const logger = createLogger(config.logLevel, config.environment);
    const coordinator = new IngestionCoordinator({
      config,
      logger,
      stateStore: new DynamoStateStore(new DynamoDBClient({}), config.stateTableName),
      archiveStore: new S3ArchiveStore(new S3Client({}), config.archiveBucketName),
    });
    runtime = { coordinator, config, logger };
  }
  return runtime;
}

export const handler = (event: unknown, context: Context) => createIngestHandler(getRuntime())(event, context);
