export { canonicalizeGraph, buildCanonicalNameTable, isNodeReference, STANDARD_NODE_IDS } from "./graph/canonicalize.js";
export { EngineClient } from "./engine/client.js";
export type { ArtifactLocation, HistoryManifest, PromptAnswer, SystemStats } from "./engine/client.js";
export { decodeLifecycleFrame } from "./engine/events.js";
export type { DecodedFrame, LifecycleEvent } from "./engine/events.js";
export { ExecutionMonitor } from "./engine/monitor.js";
export type { ExecutionFailure, MonitorOutcome, MonitorState } from "./engine/monitor.js";
export { awaitEngineReady, probeEngine } from "./engine/readiness.js";
export type { EngineStatus } from "./engine/readiness.js";
export { WsStreamConnection, connectWebSocket, createWebSocketConnector } from "./engine/stream.js";
export type { StreamConnection, StreamConnector, StreamFrame } from "./engine/stream.js";
export { JobSubmitter } from "./engine/submitter.js";
export { describeEngine } from "./job/diagnostics.js";
export { parseJobInput } from "./job/input.js";
export type { InputImage, JobInput } from "./job/input.js";
export { uploadInputImages } from "./job/inputImages.js";
export { JobRunner, buildResultPayload, describeFailure } from "./job/runner.js";
export type { Job, JobRunnerDependencies } from "./job/runner.js";
export { StructuredLogger } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export { OutputCollector, classifyResult } from "./outputs/collector.js";
export { HttpBucketUploader, createUploader, withTempFile } from "./outputs/storage.js";
export type { ArtifactUploader } from "./outputs/storage.js";
export { collectRedactionTokens, engineHttpUrl, engineStreamUrl, loadWorkerConfig } from "./worker/config.js";
export type { EngineConfig, StorageConfig, StreamConfig, WorkerConfig } from "./worker/config.js";
export * from "./worker/errors.js";
export * from "./worker/types.js";
