/**
 * telemetry.ts — Ships log records to Azure Application Insights
 *
 * Every record that passes LOG_LEVEL is also sent as an App Insights trace,
 * with its metadata flattened into custom properties.
 */

import appInsights from "applicationinsights";
import { addLogSink, type LogLevel, type LogSink } from "./logger.js";

/** What we need from TelemetryClient */
export interface TraceClient {
    trackTrace(telemetry: {
        message: string;
        severity?: number;
        properties?: Record<string, string>;
    }): void;
    flush(options?: { callback?: (response: string) => void }): void;
}

// Values of Contracts.SeverityLevel
const SEVERITY: Record<LogLevel, number> = {
    debug: 0, // Verbose
    info: 1, // Information
    warn: 2, // Warning
    error: 3, // Error
};

function toProperties(meta: unknown): Record<string, string> | undefined {
    if (meta === undefined) return undefined;
    if (typeof meta !== "object" || meta === null || Array.isArray(meta)) {
        return { meta: JSON.stringify(meta) };
    }
    const props: Record<string, string> = {};
    for (const [key, value] of Object.entries(meta)) {
        props[key] = typeof value === "string" ? value : JSON.stringify(value);
    }
    return props;
}

export function createTraceSink(client: TraceClient): LogSink {
    return (level, message, meta) => {
        const properties = toProperties(meta);
        client.trackTrace(
            properties
                ? { message, severity: SEVERITY[level], properties }
                : { message, severity: SEVERITY[level] }
        );
    };
}

export interface Telemetry {
    /** Resolves once buffered traces are sent, or after FLUSH_TIMEOUT_MS */
    flush(): Promise<void>;
    detach(): void;
}

export const FLUSH_TIMEOUT_MS = 5_000;

/** Start forwarding logs to App Insights */
export function initTelemetry(connectionString: string, client?: TraceClient): Telemetry {
    const traceClient: TraceClient = client ?? new appInsights.TelemetryClient(connectionString);
    const detach = addLogSink(createTraceSink(traceClient));
    return {
        flush: () =>
            new Promise<void>((resolve) => {
                setTimeout(resolve, FLUSH_TIMEOUT_MS).unref();
                traceClient.flush({ callback: () => resolve() });
            }),
        detach,
    };
}
