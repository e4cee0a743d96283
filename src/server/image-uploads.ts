import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { ChatError } from '../../packages/chat-core/src/index.ts';
import type { GeminiInlineImage } from '../../packages/chat-ai/src/index.ts';

export const UPLOADS_URL_PREFIX = '/uploads/';
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const EXTENSION_BY_MIME_TYPE: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

const MIME_TYPE_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

const STORED_FILE_NAME_PATTERN = /^[A-Za-z0-9-]{1,64}\.(jpg|jpeg|png|gif|webp)$/u;

export type UploadRejection = 'unsupported_type' | 'too_large' | 'empty';

export class UploadRejectedError extends ChatError {
  public readonly reason: UploadRejection;

  public constructor(reason: UploadRejection, message: string) {
    super('protocol', message);
    this.name = 'UploadRejectedError';
    this.reason = reason;
  }
}

export interface StoredImage {
  readonly imageRef: string;
  readonly url: string;
}

export interface LoadedImage {
  readonly fileName: string;
  readonly mimeType: string;
  readonly data: Buffer;
}

export function normalizeImageMimeType(contentType: string | undefined): string | null {
  if (contentType === undefined) {
    return null;
  }
  const mimeType = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return EXTENSION_BY_MIME_TYPE[mimeType] !== undefined ? mimeType : null;
}

/**
 * Accepts only names this store could have produced, so a reference can never
 * walk out of the upload directory.
 */
export function isStoredImageName(fileName: string): boolean {
  return STORED_FILE_NAME_PATTERN.test(fileName);
}

/** Strips an optional `/uploads/` prefix from an image reference. */
export function imageRefFileName(imageRef: string): string | null {
  const trimmed = imageRef.trim();
  const fileName = trimmed.startsWith(UPLOADS_URL_PREFIX)
    ? trimmed.slice(UPLOADS_URL_PREFIX.length)
    : trimmed;
  return isStoredImageName(fileName) ? fileName : null;
}

export class ImageUploadStore {
  public readonly directory: string;
  public readonly maxBytes: number;
  private readonly createId: () => string;

  public constructor(options: {
    directory: string;
    maxBytes?: number;
    createId?: () => string;
  }) {
    this.directory = options.directory;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
    this.createId = options.createId ?? randomUUID;
    mkdirSync(this.directory, { recursive: true });
  }

  public async save(contentType: string | undefined, data: Buffer): Promise<StoredImage> {
    const mimeType = normalizeImageMimeType(contentType);
    if (mimeType === null) {
      throw new UploadRejectedError(
        'unsupported_type',
        'invalid file type; allowed: image/jpeg, image/png, image/gif, image/webp',
      );
    }
    if (data.byteLength === 0) {
      throw new UploadRejectedError('empty', 'upload body is empty');
    }
    if (data.byteLength > this.maxBytes) {
      throw new UploadRejectedError('too_large', `upload exceeds ${String(this.maxBytes)} bytes`);
    }
    const fileName = `${this.createId()}${EXTENSION_BY_MIME_TYPE[mimeType] ?? ''}`;
    await writeFile(join(this.directory, fileName), data);
    return {
      imageRef: fileName,
      url: `${UPLOADS_URL_PREFIX}${fileName}`,
    };
  }

  /** Returns null for unknown or unsafe names. */
  public async load(imageRef: string): Promise<LoadedImage | null> {
    const fileName = imageRefFileName(imageRef);
    if (fileName === null) {
      return null;
    }
    const mimeType = MIME_TYPE_BY_EXTENSION[extname(fileName).toLowerCase()];
    if (mimeType === undefined) {
      return null;
    }
    try {
      const data = await readFile(join(this.directory, fileName));
      return { fileName, mimeType, data };
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /** Resolver handed to the Gemini client; unknown references are sent without the image. */
  public async resolveInlineImage(imageRef: string): Promise<GeminiInlineImage | null> {
    const loaded = await this.load(imageRef);
    if (loaded === null) {
      return null;
    }
    return {
      mimeType: loaded.mimeType,
      data: loaded.data.toString('base64'),
    };
  }
}
