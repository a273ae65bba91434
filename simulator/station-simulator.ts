#!/usr/bin/env node
// simulator/station-simulator.ts
import { Command, InvalidArgumentError } from "commander";
import { createLogger } from "../cdk/lambda/logger";
import { FleetSimulator, IotDataPublisher } from "./fleet";
import { SwapStation, stationId } from "./station";

type SimulatorOptions = {
  numStations: number;
  interval: number;
  endpoint?: string;
  region?: string;
  topicPrefix: string;
  once?: boolean;
  logLevel: string;
};

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("station-simulator")
    .description("Simulate battery swap stations publishing telemetry to AWS IoT Core")
    .option("-n, --num-stations <count>", "number of stations to simulate", positiveInt, 10)
    .option("-i, --interval <seconds>", "seconds between telemetry updates", positiveInt, 5)
    .option("-e, --endpoint <host>", "IoT data endpoint (defaults to $IOT_ENDPOINT)")
    .option("-r, --region <region>", "AWS region")
    .option("-t, --topic-prefix <prefix>", "topic prefix", "ev/station")
    .option("--once", "publish a single round and exit")
    .option("--log-level <level>", "pino log level", "info")
    .action(async (options: SimulatorOptions) => {
      const logger = createLogger(options.logLevel, "simulator");
      const endpoint = options.endpoint ?? process.env.IOT_ENDPOINT;
      if (!endpoint) {
        logger.error("no IoT endpoint: pass --endpoint or set IOT_ENDPOINT (IoT Core > Settings)");
        process.exitCode = 1;
        return;
      }

      const stations = Array.from({ length: options.numStations }, (_, i) => new SwapStation(stationId(i + 1)));
      const simulator = new FleetSimulator(
        stations,
        IotDataPublisher.forEndpoint(endpoint, options.region),
        logger,
        options.topicPrefix
      );

      if (options.once) {
        await simulator.tick();
        return;
      }

      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());
      process.once("SIGTERM", () => controller.abort());
      await simulator.run(options.interval * 1000, controller.signal);
    });
  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
