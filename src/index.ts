export {
  RadarCacheEngine,
  createRadarCacheEngine,
  getRadarCacheEngine,
  resetRadarCacheEngine,
  type EngineEvent,
  type EngineListener,
  type EngineOptions,
} from './engine';
export { DEFAULT_CONFIG, loadConfigFromEnv, type EngineConfig } from './config';

// Cache
export * from './services/cache/keys';
export * from './services/cache/errors';
export * from './services/cache/types';
export {
  computeState,
  deriveExpectedRecords,
  expectedRecordsFor,
  isForwardTransition,
  missingRecordIds,
  DEFAULT_RADIALS_PER_RECORD,
  type VcpCut,
  type VcpProbe,
  type VcpSummary,
} from './services/cache/completeness';
export { MemoryKeyValueStore, type KeyValueStore } from './services/cache/kvStore';
export { FileSystemKeyValueStore } from './services/cache/fileSystemKvStore';
export { RecordCache, type RecordCacheEvent, type StoreRecordOptions } from './services/cache/recordCache';
export { EvictionManager } from './services/cache/evictionManager';

// Acquisition and assembly
export * from './services/nexrad/types';
export { splitArchiveIntoRecords, reassembleRecords } from './services/nexrad/archiveSplitter';
export { AcquisitionScheduler } from './services/nexrad/acquisitionScheduler';
export { S3ArchiveSource } from './services/nexrad/s3Client';
export { S3ChunkSource } from './services/nexrad/chunkClient';
export { DecodePool } from './services/nexrad/decodePool';
export { VolumeRing } from './services/nexrad/volumeRing';
export { VolumeAssembler } from './services/nexrad/volumeAssembler';
export {
  level2Decoder,
  decodeVolume,
  maybeGunzip,
  probeVcp,
  volumeTiming,
  type DecodedVolume,
} from './services/nexrad/decoder';
export { getVcpDefinition, knownVcpPatterns, vcpSummaryFromPattern } from './services/nexrad/vcp';

// State
export { orderedTasks, type AcquisitionTask, type TaskKind, type TaskState } from './stores/acquisitionStore';
export type { LivePhase, SessionState } from './stores/sessionStore';
export { DEFAULT_RETRY_POLICY, type RetryPolicy } from './utils/backoff';
