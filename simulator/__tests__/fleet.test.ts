import { describe, expect, test } from "vitest";
import { PublishCommand, type IoTDataPlaneClient } from "@aws-sdk/client-iot-data-plane";
import { FleetSimulator, IotDataPublisher, telemetryTopic, type TelemetryPublisher } from "../fleet";
import { SwapStation } from "../station";
import { silentLogger } from "../../cdk/lambda/logger";
import type { TelemetryEvent } from "../../cdk/lambda/validate";

const NOW = new Date("2024-01-15T14:23:45.000Z");
const quiet = () => 0.5;

class RecordingPublisher implements TelemetryPublisher {
  readonly sent: { topic: string; message: TelemetryEvent }[] = [];
  failFor = new Set<string>();

  async publish(topic: string, message: TelemetryEvent): Promise<void> {
    if (this.failFor.has(message.device_id)) throw new Error("connection reset");
    this.sent.push({ topic, message });
  }
}

describe("telemetryTopic", () => {
  test("builds the per-station topic", () => {
    expect(telemetryTopic("ev/station", "station-01")).toBe("ev/station/station-01/telemetry");
    expect(telemetryTopic("ev/station/", "station-01")).toBe("ev/station/station-01/telemetry");
  });
});

describe("FleetSimulator", () => {
  const fleet = () => [new SwapStation("station-01", quiet, () => NOW), new SwapStation("station-02", quiet, () => NOW)];

  test("publishes one message per station per tick", async () => {
    const publisher = new RecordingPublisher();
    const published = await new FleetSimulator(fleet(), publisher, silentLogger).tick();

    expect(published).toBe(2);
    expect(publisher.sent.map((s) => s.topic)).toEqual([
      "ev/station/station-01/telemetry",
      "ev/station/station-02/telemetry",
    ]);
  });

  test("a failed publish does not stop the others", async () => {
    const publisher = new RecordingPublisher();
    publisher.failFor.add("station-01");

    const published = await new FleetSimulator(fleet(), publisher, silentLogger).tick();

    expect(published).toBe(1);
    expect(publisher.sent[0].message.device_id).toBe("station-02");
  });

  test("run stops when the signal aborts", async () => {
    const publisher = new RecordingPublisher();
    const controller = new AbortController();
    const simulator = new FleetSimulator(fleet(), publisher, silentLogger);
    publisher.publish = async (topic, message) => {
      publisher.sent.push({ topic, message });
      controller.abort();
    };

    await simulator.run(60_000, controller.signal);

    expect(publisher.sent).toHaveLength(2);
  });
});

describe("IotDataPublisher", () => {
  test("sends QoS 1 JSON payloads", async () => {
    const commands: PublishCommand[] = [];
    const client = {
      send: async (command: unknown) => {
        if (command instanceof PublishCommand) commands.push(command);
        return {};
      },
    };
    const publisher = new IotDataPublisher(client as unknown as IoTDataPlaneClient);
    const message = new SwapStation("station-05", quiet, () => NOW).telemetry();

    await publisher.publish("ev/station/station-05/telemetry", message);

    expect(commands).toHaveLength(1);
    expect(commands[0].input.topic).toBe("ev/station/station-05/telemetry");
    expect(commands[0].input.qos).toBe(1);
    const payload = commands[0].input.payload;
    expect(payload instanceof Uint8Array && JSON.parse(new TextDecoder().decode(payload))).toEqual(message);
  });
});
