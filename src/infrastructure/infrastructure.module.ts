import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { SharedModule } from '../shared/shared.module';
import {
  ARTIFACT_STORE_PORT,
  DOCUMENT_CONVERTER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
  PAGE_RASTERIZER_PORT,
  WORKSPACE_PORT,
} from '../application/ports/output/injection-tokens';

// Adapters (implementations)
import { InMemoryJobRegistryAdapter } from './adapters/persistence/in-memory-job-registry.adapter';
import { FsWorkspaceAdapter } from './adapters/workspace/fs-workspace.adapter';
import { LibreOfficeConverterAdapter } from './adapters/converter/libreoffice-converter.adapter';
import { PdftoppmRasterizerAdapter } from './adapters/rasterizer/pdftoppm-rasterizer.adapter';
import { LocalArtifactStoreAdapter } from './adapters/storage/local-artifact-store.adapter';
import { LogEventPublisherAdapter } from './adapters/events/log-event-publisher.adapter';

export {
  ARTIFACT_STORE_PORT,
  DOCUMENT_CONVERTER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_REGISTRY_PORT,
  PAGE_RASTERIZER_PORT,
  WORKSPACE_PORT,
};

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared services (logging, process runner, tool locator)
 * 2. Creates adapters that implement ports
 * 3. Exports the port tokens so they can be injected into use cases
 *
 * The job registry is one instance per application; every consumer gets
 * the same Map through the token.
 */
@Module({
  imports: [ConfigModule, SharedModule],
  providers: [
    // Persistence adapters
    InMemoryJobRegistryAdapter,
    {
      provide: JOB_REGISTRY_PORT,
      useExisting: InMemoryJobRegistryAdapter,
    },

    // Filesystem adapters
    FsWorkspaceAdapter,
    {
      provide: WORKSPACE_PORT,
      useExisting: FsWorkspaceAdapter,
    },
    LocalArtifactStoreAdapter,
    {
      provide: ARTIFACT_STORE_PORT,
      useExisting: LocalArtifactStoreAdapter,
    },

    // External tool adapters
    LibreOfficeConverterAdapter,
    {
      provide: DOCUMENT_CONVERTER_PORT,
      useExisting: LibreOfficeConverterAdapter,
    },
    PdftoppmRasterizerAdapter,
    {
      provide: PAGE_RASTERIZER_PORT,
      useExisting: PdftoppmRasterizerAdapter,
    },

    // Event publisher adapter
    LogEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useExisting: LogEventPublisherAdapter,
    },
  ],
  exports: [
    SharedModule,
    // Export port tokens so they can be injected
    JOB_REGISTRY_PORT,
    WORKSPACE_PORT,
    ARTIFACT_STORE_PORT,
    DOCUMENT_CONVERTER_PORT,
    PAGE_RASTERIZER_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
