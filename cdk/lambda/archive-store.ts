// cdk/lambda/archive-store.ts
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { NormalizedTelemetry } from "./normalize";
import { parseInstant } from "./validate";
import { toWriteFailure, type StoreWriteResult } from "./errors";

export interface ArchiveWriter {
  /** Append-only: callers supply a key that has never been written. */
  append(key: string, body: Uint8Array, metadata: Record<string, string>): Promise<StoreWriteResult>;
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * {prefix}/year=YYYY/month=MM/day=DD/{device}_{YYYYMMDD}_{HHMMSS}_{token}.json
 *
 * Date parts come from the event's own UTC instant, not the time of arrival.
 */
export function archiveKeyFor(event: Pick<NormalizedTelemetry, "device_id" | "timestamp">, token: string, prefix: string): string {
  const at = parseInstant(event.timestamp);
  if (!at) throw new RangeError(`cannot partition by timestamp '${event.timestamp}'`);

  const year = String(at.getUTCFullYear());
  const month = pad(at.getUTCMonth() + 1);
  const day = pad(at.getUTCDate());
  const clock = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const device = event.device_id.replace(/[^A-Za-z0-9._-]/g, "-");

  const name = `year=${year}/month=${month}/day=${day}/${device}_${year}${month}${day}_${clock}_${token}.json`;
  return prefix ? `${prefix}/${name}` : name;
}

export class S3ArchiveStore implements ArchiveWriter {
  constructor(
    private readonly client: S3Client,
    private readonly bucketName: string
  ) {}

  async append(key: string, body: Uint8Array, metadata: Record<string, string>): Promise<StoreWriteResult> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucketName,
          Key: key,
          Body: body,
          ContentType: "application/json",
          Metadata: metadata,
        })
      );
      return { ok: true };
    } catch (err) {
      return toWriteFailure(err);
    }
  }
}
