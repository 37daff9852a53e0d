/**
 * @fileoverview OpenTelemetry Tracing Setup
 *
 * Auto-instrumentation with OTLP export. An analysis request and its outbound LLM call
 * (an HTTPS request made by the provider SDK) land in the same trace.
 * This file MUST be imported before any other imports in main.ts.
 *
 * @remarks
 * Local: exports to http://localhost:4318, every trace sampled
 * Production: set OTEL_EXPORTER_OTLP_ENDPOINT; 10% of root traces sampled
 * Set OTEL_SDK_DISABLED=true to turn tracing off entirely.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { AlwaysOnSampler, ParentBasedSampler, TraceIdRatioBasedSampler } from '@opentelemetry/sdk-trace-node';

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || 'protocol-review-api';

// Probe and scrape endpoints
const UNTRACED_PATHS = ['/health', '/metrics'];

const environment = process.env.NODE_ENV || 'development';
const enabled = process.env.OTEL_SDK_DISABLED !== 'true';

const sdk = new NodeSDK({
    resource: new Resource({
        [SemanticResourceAttributes.SERVICE_NAME]: SERVICE_NAME,
        [SemanticResourceAttributes.SERVICE_VERSION]: '1.0.0',
        [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: environment,
    }),
    traceExporter: new OTLPTraceExporter({
        url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
    }),
    sampler:
        environment === 'production'
            ? new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(0.1) })
            : new AlwaysOnSampler(),
    instrumentations: [
        getNodeAutoInstrumentations({
            '@opentelemetry/instrumentation-fs': { enabled: false },
            '@opentelemetry/instrumentation-dns': { enabled: false },
            '@opentelemetry/instrumentation-http': {
                ignoreIncomingRequestHook: (request) => UNTRACED_PATHS.includes(request.url ?? ''),
            },
        }),
    ],
});

if (enabled) {
    sdk.start();

    process.on('SIGTERM', () => {
        sdk.shutdown()
            .then(() => console.log('Tracing terminated'))
            .catch((error: unknown) => console.error('Error terminating tracing', error))
            .finally(() => process.exit(0));
    });
}

export { sdk };
