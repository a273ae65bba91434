// cdk/lambda/state-store.ts
import { DynamoDBClient, PutItemCommand } from "@aws-sdk/client-dynamodb";
import type { AttributeValue } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, GetCommand, NumberValue, ScanCommand } from "@aws-sdk/lib-dynamodb";
import type { NormalizedTelemetry } from "./normalize";
import { toWriteFailure, type StoreWriteResult } from "./errors";

export type StationRecord = Record<string, unknown>;

export interface StateWriter {
  /** Unconditional put keyed by device id: the last call to land wins. */
  upsert(event: NormalizedTelemetry, writtenAt: Date): Promise<StoreWriteResult>;
}

export interface StateReader {
  get(deviceId: string): Promise<StationRecord | undefined>;
  list(): Promise<StationRecord[]>;
}

/** DynamoDB attribute map for a state record. Numbers keep their fixed-point text. */
export function toStateItem(event: NormalizedTelemetry, writtenAt: Date): Record<string, AttributeValue> {
  const item: Record<string, AttributeValue> = {
    device_id: { S: event.device_id },
    battery_available: { N: String(event.battery_available) },
    battery_charging: { N: String(event.battery_charging) },
    temperature: { N: event.temperature.toString() },
    humidity: { N: event.humidity.toString() },
    status: { S: event.status },
    timestamp: { S: event.timestamp },
    last_updated: { S: writtenAt.toISOString() },
  };
  if (event.total_swaps_today !== undefined) {
    item.total_swaps_today = { N: String(event.total_swaps_today) };
  }
  if (event.last_swap_time !== undefined) {
    item.last_swap_time = { S: event.last_swap_time };
  }
  return item;
}

/**
 * Stored numbers are read wrapped so that values outside the safe integer
 * range or with wide fixed-point text survive unmarshalling; here they become
 * plain JSON numbers.
 */
export function fromStoredItem(item: Record<string, unknown>): StationRecord {
  return Object.fromEntries(Object.entries(item).map(([key, value]) => [key, plainNumbers(value)]));
}

function plainNumbers(value: unknown): unknown {
  if (value instanceof NumberValue) return Number(value.toString());
  if (Array.isArray(value)) return value.map(plainNumbers);
  if (value instanceof Set) return [...value].map(plainNumbers);
  if (value instanceof Uint8Array) return value;
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [key, plainNumbers(v)]));
  }
  return value;
}

export class DynamoStateStore implements StateWriter, StateReader {
  constructor(
    private readonly client: DynamoDBClient,
    private readonly tableName: string,
    private readonly docClient: DynamoDBDocumentClient = DynamoDBDocumentClient.from(client, {
      unmarshallOptions: { wrapNumbers: true },
    })
  ) {}

  async upsert(event: NormalizedTelemetry, writtenAt: Date): Promise<StoreWriteResult> {
    try {
      await this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: toStateItem(event, writtenAt),
        })
      );
      return { ok: true };
    } catch (err) {
      return toWriteFailure(err);
    }
  }

  async get(deviceId: string): Promise<StationRecord | undefined> {
    const res = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { device_id: deviceId },
      })
    );
    return res.Item && fromStoredItem(res.Item);
  }

  async list(): Promise<StationRecord[]> {
    const items: StationRecord[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const res = await this.docClient.send(
        new ScanCommand({
          TableName: this.tableName,
          ExclusiveStartKey: startKey,
        })
      );
      items.push(...(res.Items ?? []).map(fromStoredItem));
      startKey = res.LastEvaluatedKey;
    } while (startKey);
    return items;
  }
}
