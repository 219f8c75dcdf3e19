export * from './types';
export * from './errors';
export { DebugLogger, logger } from './logger';
export { ResourceLifecycle } from './lifecycle';
export type { Closeable } from './lifecycle';
export { ThroughputMeter } from './meter';
export type { Clock, MeterOptions } from './meter';
export { ByteArena, PersistentTransport, connectSocket } from './transport';
export type { TransportOptions } from './transport';
export { BaseEngine } from './engine';
export type { MeasurementEngine } from './engine';
export { CloudflareEngine, EdgeCacheEngine, FastEngine, SocketCdnEngine, byId, byName, engines } from './engines';
export type { EngineEntry } from './engines';
export { Orchestrator } from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';
export { createApp, startServer } from './server';
export type { ServerOptions } from './server';
