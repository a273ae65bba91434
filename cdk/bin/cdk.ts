import { App } from "aws-cdk-lib";
import { StationTelemetryStack } from "../lib/cdk-stack";

const app = new App();
const allowOrigins = app.node.tryGetContext("allowOrigins");

new StationTelemetryStack(app, "StationTelemetryStack", {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  allowOrigins: typeof allowOrigins === "string" ? allowOrigins.split(",") : undefined,
  environmentName: app.node.tryGetContext("environment"),
});
