// cdk/functions/telemetry-api.ts
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { loadApiConfig } from "../lambda/config";
import { createLogger, type Logger } from "../lambda/logger";
import { DynamoStateStore, type StateReader } from "../lambda/state-store";

export interface ApiRuntime {
  stations: StateReader;
  corsAllowOrigin: string;
  logger: Logger;
}

type ApiEvent = Pick<APIGatewayProxyEventV2, "rawPath" | "pathParameters"> & {
  requestContext: { http: { method: string } };
};

export function createApiHandler({ stations, corsAllowOrigin, logger }: ApiRuntime) {
  const corsHeaders = {
    "Access-Control-Allow-Origin": corsAllowOrigin,
    "Access-Control-Allow-Methods": "GET,OPTIONS",
    "Access-Control-Allow-Headers": "content-type",
  };

  function json(status: number, body: unknown): APIGatewayProxyStructuredResultV2 {
    return {
      statusCode: status,
      headers: { ...corsHeaders, "content-type": "application/json" },
      body: JSON.stringify(body),
    };
  }

  return async (event: ApiEvent): Promise<APIGatewayProxyStructuredResultV2> => {
    const method = event.requestContext.http.method.toUpperCase();
    const rawPath = event.rawPath.replace(/\/+$/, "") || "/";

    if (method === "OPTIONS") {
      return json(200, { message: "CORS preflight response" });
    }
    if (method !== "GET") {
      return json(405, { error: "Method not allowed", message: `Method ${method} not supported` });
    }

    try {
      // /stations
      if (rawPath === "/stations") {
        const items = await stations.list();
        logger.info({ count: items.length }, "listed stations");
        return json(200, { count: items.length, stations: items });
      }

      // /stations/{stationId}
      const m = rawPath.match(/^\/stations\/([^/]*)$/);
      if (m) {
        const stationId = event.pathParameters?.stationId ?? decodePathSegment(m[1]);
        if (stationId === undefined) {
          return json(400, { error: "Bad request", message: "stationId is not a valid path segment" });
        }
        if (!stationId) {
          return json(400, { error: "Bad request", message: "stationId is required" });
        }
        const station = await stations.get(stationId);
        if (!station) {
          logger.warn({ station_id: stationId }, "station not found");
          return json(404, { error: "Not found", message: `Station ${stationId} not found` });
        }
        return json(200, { station });
      }

      return json(404, { error: "Not found", message: `Path ${event.rawPath} not found` });
    } catch (err) {
      logger.error({ err, path: event.rawPath }, "station query failed");
      return json(500, { error: "Internal server error", message: "Failed to retrieve stations" });
    }
  };
}

function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

let apiHandler: ReturnType<typeof createApiHandler> | undefined;

export const handler = async (event: APIGatewayProxyEventV2) => {
  if (!apiHandler) {
    const config = loadApiConfig();
    apiHandler = createApiHandler({
      stations: new DynamoStateStore(new DynamoDBClient({}), config.stateTableName),
      corsAllowOrigin: config.corsAllowOrigin,
      logger: createLogger(config.logLevel, config.environment),
    });
  }
  return apiHandler(event);
};
