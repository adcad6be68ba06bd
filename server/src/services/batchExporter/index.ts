export { BatchExporter, defaultBatchId, STAGING_DIR_NAME } from './exporter.js';
export type { BatchExporterDeps, ExporterStatus, ExportTrigger } from './exporter.js';
export { InMemoryExportLock, PostgresAdvisoryLock, EXPORT_ADVISORY_LOCK_KEY } from './exportLock.js';
export type { ExportLock, LockResult } from './exportLock.js';
export { validateStagedPackage, checkReferentialIntegrity } from './integrityValidator.js';
export { buildPackage } from './packageBuilder.js';
export { writeStagedPackage } from './packageWriter.js';
export type { PackageWriter } from './packageWriter.js';
export * from './types.js';
