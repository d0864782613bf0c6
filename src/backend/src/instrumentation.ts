/*instrumentation.ts*/
// Imported first by index.ts so auto-instrumentation patches express and http before they load
import { NodeSDK } from '@opentelemetry/sdk-node';
import { credentials } from '@grpc/grpc-js';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc';
import { SimpleLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { logger } from './utils/logger.js';

diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN);

let sdk: NodeSDK | null = null;

export function startTelemetry(otlpServer: string | undefined): NodeSDK | null {
  if (!otlpServer) {
    logger.info('No OTLP server configured, skipping OpenTelemetry setup');
    return null;
  }

  logger.info(`OTLP server configured at ${otlpServer}`);
  const grpcOptions = {
    url: otlpServer,
    credentials: otlpServer.startsWith('https://') ? credentials.createSsl() : credentials.createInsecure(),
  };

  const instance = new NodeSDK({
    serviceName: 'blackjack-ev-trainer',
    traceExporter: new OTLPTraceExporter(grpcOptions),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter(grpcOptions),
      exportIntervalMillis: 10000,
      exportTimeoutMillis: 10000,
    }),
    logRecordProcessors: [new SimpleLogRecordProcessor(new OTLPLogExporter(grpcOptions))],
    instrumentations: [getNodeAutoInstrumentations()],
  });

  instance.start();
  logger.info('OpenTelemetry SDK started with gRPC exporters');
  return instance;
}

export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
  sdk = null;
}

try {
  sdk = startTelemetry(process.env.OTEL_EXPORTER_OTLP_ENDPOINT);
} catch (error) {
  logger.error('Failed to start OpenTelemetry SDK:', error);
  process.exit(1);
}
