export { TrackingClient, ENDPOINTS, type TrackingClientOptions } from "./trackingClient.js";
export { RequestDispatcher, type DispatcherOptions, type FetchLike } from "./dispatcher.js";
export { TrackingDecodeError, TrackingSerializationError, TrackingTransportError } from "./errors.js";
export { addQuery, flattenQuery, type QueryParams, type QueryValue } from "../core/queryParams.js";
export type { Experiment, LifecycleStage, Run, RunInfo, RunStatus, RunTag } from "../core/entities.js";
export { LIFECYCLE_STAGES, RUN_STATUSES } from "../core/entities.js";
