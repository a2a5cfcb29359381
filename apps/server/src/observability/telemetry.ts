import type http from 'node:http';
import { diag, DiagConsoleLogger, DiagLogLevel, type Meter, type Tracer, trace } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { type MetricReader, MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { defaultResource, resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { logger } from './logger.js';

const SERVICE_NAME = 'trio-server';

export type MetricsHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void | Promise<void>;

export interface Telemetry {
  tracer: Tracer;
  meter: Meter;
  metricsHandler: MetricsHandler;
}

let telemetry: Telemetry | null = null;

function createResource() {
  const attributes = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: process.env.OTEL_SERVICE_NAME ?? SERVICE_NAME,
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? 'dev',
  });
  return defaultResource().merge(attributes);
}

function withSignalPath(baseEndpoint: string, signal: 'traces' | 'metrics') {
  const suffix = `/v1/${signal}`;
  return baseEndpoint.endsWith(suffix) ? baseEndpoint : `${baseEndpoint.replace(/\/$/, '')}${suffix}`;
}

function createSpanExporter(): SpanExporter | null {
  if (process.env.OTEL_TRACES_EXPORTER === 'none') {
    return null;
  }

  const tracesEndpoint = process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT;
  if (tracesEndpoint) {
    return new OTLPTraceExporter({ url: tracesEndpoint });
  }

  const baseEndpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (baseEndpoint) {
    return new OTLPTraceExporter({ url: withSignalPath(baseEndpoint, 'traces') });
  }

  return new ConsoleSpanExporter();
}

function createSpanProcessors(): SpanProcessor[] {
  const exporter = createSpanExporter();
  if (!exporter) {
    return [];
  }
  return [exporter instanceof ConsoleSpanExporter ? new SimpleSpanProcessor(exporter) : new BatchSpanProcessor(exporter)];
}

function createMetricReaders() {
  // Prometheus is always on; /metrics reads from it.
  const prometheusExporter = new PrometheusExporter({ preventServerStart: true });
  const readers: MetricReader[] = [prometheusExporter];

  const metricsEndpoint = process.env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT;
  const baseEndpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  const url = metricsEndpoint ?? (baseEndpoint ? withSignalPath(baseEndpoint, 'metrics') : undefined);

  if (url) {
    readers.push(new PeriodicExportingMetricReader({ exporter: new OTLPMetricExporter({ url }) }));
  }

  return { readers, prometheusExporter };
}

export function initTelemetry(): Telemetry {
  if (telemetry) {
    return telemetry;
  }

  const diagLevel = process.env.OTEL_DEBUG ? DiagLogLevel.DEBUG : DiagLogLevel.ERROR;
  diag.setLogger(new DiagConsoleLogger(), diagLevel);

  const resource = createResource();

  const tracerProvider = new NodeTracerProvider({
    resource,
    spanProcessors: createSpanProcessors(),
  });
  tracerProvider.register();

  const { readers, prometheusExporter } = createMetricReaders();
  const meterProvider = new MeterProvider({ resource, readers });

  telemetry = {
    tracer: trace.getTracer(SERVICE_NAME),
    meter: meterProvider.getMeter(SERVICE_NAME),
    metricsHandler: (req, res) => prometheusExporter.getMetricsRequestHandler(req, res),
  };

  logger.debug('OpenTelemetry initialized', { context: { component: 'telemetry' } });

  return telemetry;
}

export function getTracer(): Tracer {
  return initTelemetry().tracer;
}

export function getMeter(): Meter {
  return initTelemetry().meter;
}

export function getMetricsHandler(): MetricsHandler {
  return initTelemetry().metricsHandler;
}
