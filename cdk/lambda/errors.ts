// cdk/lambda/errors.ts

export type StoreFailureKind = "capacity_exceeded" | "transient_unavailable";

export type StoreWriteResult =
  | { ok: true }
  | { ok: false; kind: StoreFailureKind; message: string };

export class StoreError extends Error {
  constructor(readonly kind: StoreFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class TransientStoreError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient_unavailable", message, options);
    this.name = "TransientStoreError";
  }
}

export class CapacityExceededError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("capacity_exceeded", message, options);
    this.name = "CapacityExceededError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// DynamoDB and S3 both report throttling through these names
const THROTTLING_ERRORS = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "Throttling",
  "RequestLimitExceeded",
  "TooManyRequestsException",
  "SlowDown",
]);

function errorName(err: unknown): string | undefined {
  if (err instanceof Error) return err.name;
  if (typeof err === "object" && err !== null && "name" in err && typeof err.name === "string") {
    return err.name;
  }
  return undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

/**
 * Maps whatever a store call threw onto the two failure kinds the
 * coordinator reports. Anything that is not recognisably throttling is
 * treated as the store being unavailable.
 */
export function classifyStoreError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const name = errorName(err);
  if ((name && THROTTLING_ERRORS.has(name)) || httpStatusOf(err) === 429) {
    return new CapacityExceededError(message || "store throttled the request", { cause: err });
  }
  return new TransientStoreError(message || "store unavailable", { cause: err });
}

export function toWriteFailure(err: unknown): StoreWriteResult {
  const classified = classifyStoreError(err);
  return { ok: false, kind: classified.kind, message: classified.message };
}
