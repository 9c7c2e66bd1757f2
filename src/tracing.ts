/**
 * OpenTelemetry tracing initialization.
 * Must be imported BEFORE all other imports in index.ts.
 *
 * Sends OTLP traces for registry transactions.
 * Disabled (no-op) when OTEL_EXPORTER_OTLP_ENDPOINT is not set.
 */
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { createLogger } from './logger.js';

const log = createLogger('Tracing');

const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;

if (endpoint) {
  const exporter = new OTLPTraceExporter({
    url: `${endpoint}/v1/traces`,
  });

  const provider = new NodeTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: 'identity-registry',
    }),
    spanProcessors: [
      new SimpleSpanProcessor(exporter),
    ],
  });

  provider.register();
  log.info({ endpoint: `${endpoint}/v1/traces` }, 'OTLP protobuf exporter initialized');
} else {
  log.info('OTEL_EXPORTER_OTLP_ENDPOINT not set, tracing disabled');
}
