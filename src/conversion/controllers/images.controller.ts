import {
  Controller,
  Get,
  Inject,
  NotFoundException,
  Param,
  Res,
  StreamableFile,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import type { ArtifactStorePort } from '../../application/ports/output/artifact-store.port';
import { ARTIFACT_STORE_PORT } from '../../application/ports/output/injection-tokens';

/**
 * Serves page images from the artifact store.
 */
@Controller('images')
export class ImagesController {
  constructor(@Inject(ARTIFACT_STORE_PORT) private readonly artifactStore: ArtifactStorePort) {}

  @Get(':jobId/:filename')
  async image(
    @Param('jobId') jobId: string,
    @Param('filename') filename: string,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<StreamableFile> {
    const artifact = await this.artifactStore.open(jobId, filename);
    if (!artifact) {
      throw new NotFoundException(`Image not found: ${jobId}/${filename}`);
    }

    reply.header('cache-control', 'private, max-age=3600');

    return new StreamableFile(artifact.stream, {
      type: artifact.contentType,
      length: artifact.sizeBytes,
    });
  }
}
