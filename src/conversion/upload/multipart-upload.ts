import type { FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { UploadRejectedError } from '../../domain/errors/conversion.errors';

export const UPLOAD_FIELD = 'file';

export interface UploadedDocument {
  filename: string;
  content: Buffer;
}

function isFileTooLarge(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'FST_REQ_FILE_TOO_LARGE';
}

/**
 * Reads the `file` part of a multipart upload into memory. Size limits are
 * enforced by the multipart plugin while streaming.
 */
export async function readUpload(req: FastifyRequest): Promise<UploadedDocument> {
  if (!req.isMultipart()) {
    throw new UploadRejectedError(
      'missing_file',
      `Expected a multipart/form-data body with a "${UPLOAD_FIELD}" field`,
    );
  }

  const part: MultipartFile | undefined = await req.file();
  if (!part || part.fieldname !== UPLOAD_FIELD || !part.filename) {
    throw new UploadRejectedError('missing_file', `No "${UPLOAD_FIELD}" field in the upload`);
  }

  try {
    return { filename: part.filename, content: await part.toBuffer() };
  } catch (error) {
    if (isFileTooLarge(error)) {
      throw new UploadRejectedError('too_large', 'File exceeds the maximum upload size');
    }
    throw error;
  }
}
