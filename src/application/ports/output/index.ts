/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { JobRegistryPort, JobMutation, CreateJobProps } from './job-registry.port';
export type { WorkspacePort, Workspace } from './workspace.port';
export type { DocumentConverterPort } from './document-converter.port';
export type { PageRasterizerPort } from './page-rasterizer.port';
export type { ArtifactStorePort, StoredArtifact } from './artifact-store.port';
export type {
  ConversionPoolPort,
  ConversionPoolStats,
  SubmitOptions,
} from './conversion-pool.port';
export type { EventPublisherPort } from './event-publisher.port';
export * from './injection-tokens';
