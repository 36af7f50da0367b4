/**
 * Files API Handlers
 * Multipart upload with ingestion into retrieval chunks
 */

import { ErrorFactory } from '../../errors';
import { ListFilesQuery, UploadFileFields } from '../../validators';
import type { RouteHandler } from '../router';
import { parseListQuery, requireParam, resultResponse } from './respond';

// Upload file
export const uploadFile: RouteHandler = async (request, ctx) => {
  const contentType = request.headers.get('Content-Type') ?? '';
  if (!contentType.includes('multipart/form-data')) {
    throw ErrorFactory.invalidContentType('Content-Type must be multipart/form-data');
  }

  let form: FormData;
  try {
    form = await request.formData();
  } catch (error) {
    throw ErrorFactory.fileUploadError('Could not parse multipart body', error instanceof Error ? error.message : undefined);
  }

  const entry = form.get('file');
  if (entry === null || typeof entry === 'string') {
    throw ErrorFactory.validationError("Form field 'file' must be a file", undefined, 'file');
  }
  const purpose = form.get('purpose');
  const fields = UploadFileFields.parse({ purpose: typeof purpose === 'string' ? purpose : undefined });

  const result = await ctx.app.services.files.upload(ctx.auth.ownerId, {
    filename: entry.name || 'upload',
    purpose: fields.purpose,
    data: new Uint8Array(await entry.arrayBuffer()),
  });
  return resultResponse(result);
};

// List files, optionally of one purpose
export const listFiles: RouteHandler = async (request, ctx) => {
  const { purpose } = ListFilesQuery.parse({ purpose: new URL(request.url).searchParams.get('purpose') ?? undefined });
  return resultResponse(await ctx.app.services.files.list(ctx.auth.ownerId, parseListQuery(request), purpose));
};

// Get file metadata
export const getFile: RouteHandler = async (_request, ctx, params) => {
  const fileId = requireParam(params, 'file_id');
  return resultResponse(await ctx.app.services.files.get(ctx.auth.ownerId, fileId));
};

// Download file content
export const getFileContent: RouteHandler = async (_request, ctx, params) => {
  const fileId = requireParam(params, 'file_id');
  const result = await ctx.app.services.files.getContent(ctx.auth.ownerId, fileId);
  if (!result.success || !result.data) {
    return resultResponse(result);
  }

  return new Response(result.data.data, {
    headers: {
      'Content-Type': 'application/octet-stream',
      'Content-Disposition': `attachment; filename="${result.data.file.filename.replace(/"/g, '')}"`,
    },
  });
};
