// cdk/lib/cdk-stack.ts
import * as path from "path";
import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";

import * as s3 from "aws-cdk-lib/aws-s3";
import * as dynamodb from "aws-cdk-lib/aws-dynamodb";
import * as iam from "aws-cdk-lib/aws-iam";
import * as iot from "aws-cdk-lib/aws-iot";
import * as logs from "aws-cdk-lib/aws-logs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as nodejs from "aws-cdk-lib/aws-lambda-nodejs";

import * as apigwv2 from "aws-cdk-lib/aws-apigatewayv2";
import * as apigwv2i from "aws-cdk-lib/aws-apigatewayv2-integrations";

export interface StationTelemetryStackProps extends cdk.StackProps {
  /** MQTT topic filter the stations publish on. */
  topicFilter?: string;
  /** Origins allowed to call the query API from a browser. */
  allowOrigins?: string[];
  environmentName?: string;
  logLevel?: string;
}

export class StationTelemetryStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: StationTelemetryStackProps = {}) {
    super(scope, id, props);

    const topicFilter = props.topicFilter ?? "ev/station/+/telemetry";
    const allowOrigins = props.allowOrigins ?? ["*"];
    const environmentName = props.environmentName ?? "dev";
    const logLevel = props.logLevel ?? "info";

    // ------------------
    // Latest-state table
    // ------------------
    const stateTable = new dynamodb.Table(this, "StationStateTable", {
      partitionKey: { name: "device_id", type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // --------------
    // Archive bucket
    // --------------
    const archiveBucket = new s3.Bucket(this, "TelemetryArchiveBucket", {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      versioned: false,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
      lifecycleRules: [
        {
          prefix: "telemetry/",
          transitions: [
            { storageClass: s3.StorageClass.INFREQUENT_ACCESS, transitionAfter: cdk.Duration.days(90) },
          ],
        },
      ],
    });

    // ------------------------
    // Lambda: telemetry ingest
    // ------------------------
    const ingestFn = new nodejs.NodejsFunction(this, "TelemetryIngestFn", {
      entry: path.join(__dirname, "../functions/telemetry-ingest.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(10),
      environment: {
        STATE_TABLE_NAME: stateTable.tableName,
        ARCHIVE_BUCKET_NAME: archiveBucket.bucketName,
        ARCHIVE_PREFIX: "telemetry",
        ENVIRONMENT: environmentName,
        LOG_LEVEL: logLevel,
      },
      logRetention: logs.RetentionDays.ONE_WEEK,
    });
    stateTable.grantWriteData(ingestFn);
    archiveBucket.grantPut(ingestFn);

    const iotRule = new iot.CfnTopicRule(this, "TelemetryRule", {
      topicRulePayload: {
        sql: `SELECT * FROM '${topicFilter}'`,
        awsIotSqlVersion: "2016-03-23",
        ruleDisabled: false,
        actions: [{ lambda: { functionArn: ingestFn.functionArn } }],
      },
    });

    ingestFn.addPermission("AllowIotInvoke", {
      principal: new iam.ServicePrincipal("iot.amazonaws.com"),
      sourceArn: iotRule.attrArn,
    });

    // ------------------------
    // Lambda: station queries
    // ------------------------
    const apiFn = new nodejs.NodejsFunction(this, "StationApiFn", {
      entry: path.join(__dirname, "../functions/telemetry-api.ts"),
      handler: "handler",
      runtime: lambda.Runtime.NODEJS_20_X,
      environment: {
        STATE_TABLE_NAME: stateTable.tableName,
        CORS_ALLOW_ORIGIN: allowOrigins[0] ?? "*",
        ENVIRONMENT: environmentName,
        LOG_LEVEL: logLevel,
      },
      logRetention: logs.RetentionDays.ONE_WEEK,
    });
    stateTable.grantReadData(apiFn);

    // ----------------------
    // HTTP API (v2) + CORS
    // ----------------------
    const stationApi = new apigwv2.HttpApi(this, "StationApi", {
      apiName: "StationApi",
      createDefaultStage: true,
      corsPreflight: {
        allowOrigins,
        allowMethods: [apigwv2.CorsHttpMethod.GET, apigwv2.CorsHttpMethod.OPTIONS],
        allowHeaders: ["content-type"],
      },
    });

    const stationsIntegration = new apigwv2i.HttpLambdaIntegration("StationsIntegration", apiFn);

    stationApi.addRoutes({
      path: "/stations",
      methods: [apigwv2.HttpMethod.GET],
      integration: stationsIntegration,
    });

    stationApi.addRoutes({
      path: "/stations/{stationId}",
      methods: [apigwv2.HttpMethod.GET],
      integration: stationsIntegration,
    });

    new cdk.CfnOutput(this, "StateTableName", { value: stateTable.tableName });
    new cdk.CfnOutput(this, "ArchiveBucketName", { value: archiveBucket.bucketName });
    new cdk.CfnOutput(this, "ApiUrl", { value: stationApi.apiEndpoint });
  }
}
