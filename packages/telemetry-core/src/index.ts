// From logger.ts
export {
    default as createLogger,
    createModuleLogger,
    setLogLevel,
    isLogLevel,
    LOG_LEVELS,
} from './logger';
export type { LogLevel, ModuleLogger } from './logger';

// From types.ts
export { BATTERY_STATES } from './types';
export type {
    BatteryState,
    Clock,
    Device,
    DeviceStatus,
    ErrorInfo,
    MetricExporterOptions,
    ObservedAtSource,
    PollCycleSummary,
    PollSchedulerOptions,
    Reading,
    ReadingFetcher,
    TelemetryApi,
    TelemetryFetcherOptions,
} from './types';

// From errors.ts
export {
    FetchError,
    AuthError,
    NetworkError,
    NotFoundError,
    MalformedResponseError,
    RateLimitedError,
    createFetchError,
    toFetchError,
} from './errors';
export type { FetchErrorKind } from './errors';

// From deviceRegistry.ts
export { DeviceRegistry, parseDeviceList } from './deviceRegistry';
export type { DeviceEntry } from './deviceRegistry';

// From tuyaCloudClient.ts
export { TuyaCloudClient, TUYA_REGION_HOSTS, signRequest } from './tuyaCloudClient';
export type { TuyaCloudClientOptions } from './tuyaCloudClient';

// From payloadDecoder.ts
export { decodeDevicePayload, decodeScales } from './payloadDecoder';

// From telemetryFetcher.ts
export { TelemetryFetcher, toBatteryState } from './telemetryFetcher';

// From metricStore.ts
export { MetricStore } from './metricStore';
export type { PollOutcome } from './metricStore';

// From pollScheduler.ts
export { PollScheduler } from './pollScheduler';
export type { PollSchedulerState } from './pollScheduler';

// From metricExporter.ts
export { MetricExporter, METRIC_NAMES } from './metricExporter';
