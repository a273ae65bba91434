// simulator/fleet.ts
import { setTimeout as sleep } from "node:timers/promises";
import { IoTDataPlaneClient, PublishCommand } from "@aws-sdk/client-iot-data-plane";
import type { Logger } from "../cdk/lambda/logger";
import type { TelemetryEvent } from "../cdk/lambda/validate";
import type { SwapStation } from "./station";

export interface TelemetryPublisher {
  publish(topic: string, message: TelemetryEvent): Promise<void>;
}

/** Publishes through the IoT data-plane API with QoS 1 (at least once). */
export class IotDataPublisher implements TelemetryPublisher {
  private readonly encoder = new TextEncoder();

  constructor(private readonly client: IoTDataPlaneClient) {}

  static forEndpoint(endpoint: string, region?: string): IotDataPublisher {
    const url = endpoint.startsWith("https://") ? endpoint : `https://${endpoint}`;
    return new IotDataPublisher(new IoTDataPlaneClient({ endpoint: url, region }));
  }

  async publish(topic: string, message: TelemetryEvent): Promise<void> {
    await this.client.send(
      new PublishCommand({
        topic,
        qos: 1,
        payload: this.encoder.encode(JSON.stringify(message)),
      })
    );
  }
}

export const telemetryTopic = (prefix: string, id: string) => `${prefix.replace(/\/+$/, "")}/${id}/telemetry`;

export class FleetSimulator {
  constructor(
    private readonly stations: SwapStation[],
    private readonly publisher: TelemetryPublisher,
    private readonly logger: Logger,
    private readonly topicPrefix = "ev/station"
  ) {}

  /** Advances every station one tick and publishes its telemetry. Returns how many publishes succeeded. */
  async tick(): Promise<number> {
    let published = 0;
    for (const station of this.stations) {
      station.tick();
      const message = station.telemetry();
      const topic = telemetryTopic(this.topicPrefix, station.id);
      try {
        await this.publisher.publish(topic, message);
        published += 1;
        this.logger.info(
          { station_id: station.id, battery_available: message.battery_available, temperature: message.temperature },
          "published telemetry"
        );
      } catch (err) {
        this.logger.error({ err, station_id: station.id, topic }, "publish failed");
      }
    }
    return published;
  }

  async run(intervalMs: number, signal: AbortSignal): Promise<void> {
    this.logger.info({ stations: this.stations.length, interval_ms: intervalMs }, "starting simulation");
    while (!signal.aborted) {
      await this.tick();
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        if (!signal.aborted) throw err;
      }
    }
    this.logger.info("simulation stopped");
  }
}
