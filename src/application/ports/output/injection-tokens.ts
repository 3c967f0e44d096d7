// Injection tokens (string symbols for DI)
export const JOB_REGISTRY_PORT = 'JobRegistryPort';
export const WORKSPACE_PORT = 'WorkspacePort';
export const DOCUMENT_CONVERTER_PORT = 'DocumentConverterPort';
export const PAGE_RASTERIZER_PORT = 'PageRasterizerPort';
export const ARTIFACT_STORE_PORT = 'ArtifactStorePort';
export const CONVERSION_POOL_PORT = 'ConversionPoolPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
