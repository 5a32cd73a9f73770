import path from 'node:path';

import type { FastifyRequest } from 'fastify';

import { RequestValidationError } from './errors';

export const ALLOWED_EXTENSIONS = ['xlsx', 'xls'] as const;

export type UploadedFile = {
  filename: string;
  contents: Buffer;
};

export type MultipartForm = {
  fields: Map<string, string>;
  file: UploadedFile | null;
};

/**
 * Collects the string fields and the first named file of a multipart body.
 * Further files, and file inputs submitted without a file, are drained and
 * dropped.
 */
export async function readMultipartForm(
  request: FastifyRequest,
  options: { required?: boolean } = {}
): Promise<MultipartForm> {
  const fields = new Map<string, string>();
  let file: UploadedFile | null = null;

  if (!request.isMultipart()) {
    if (options.required === false) {
      return { fields, file };
    }
    throw new RequestValidationError('Form submissions must use multipart/form-data', 415);
  }

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const contents = await part.toBuffer();
      if (!file && part.filename) {
        file = { filename: part.filename, contents };
      }
      continue;
    }
    if (typeof part.value === 'string') {
      fields.set(part.fieldname, part.value);
    }
  }

  return { fields, file };
}

export function fileExtension(filename: string): string {
  return path.extname(filename).slice(1).toLowerCase();
}

export function allowedFile(filename: string): boolean {
  const extension = fileExtension(filename);
  return ALLOWED_EXTENSIONS.some((allowed) => allowed === extension);
}

/**
 * Reduces a client-supplied filename to a safe ASCII basename.
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const base = ascii.split(/[\\/]/).pop() ?? '';
  return base
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}
