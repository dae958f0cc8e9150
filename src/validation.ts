import { readFile } from 'fs/promises';
import * as path from 'path';
import { ContentValidationError } from './errors.js';

export function validateHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new ContentValidationError(`Invalid URL: ${url}`, { cause: err });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ContentValidationError(`Only http and https URLs are supported, got: ${url}`);
  }
  return parsed;
}

export function validateMimeType(mimeType: string, allowed: ReadonlySet<string>): string {
  const normalized = mimeType.trim().toLowerCase();
  if (!allowed.has(normalized)) {
    throw new ContentValidationError(
      `Unsupported MIME type: ${mimeType}. Supported: ${[...allowed].join(', ')}`,
    );
  }
  return normalized;
}

export function validateBase64Data(data: string): string {
  if (data.trim().length === 0) {
    throw new ContentValidationError('Base64 data cannot be blank');
  }
  return data;
}

export function validatePlainText(text: string): string {
  if (text.trim().length === 0) {
    throw new ContentValidationError('Document text cannot be blank');
  }
  return text;
}

export function validateFilePath(filePath: string, allowedExtensions: ReadonlySet<string>): string {
  const extension = path.extname(filePath).toLowerCase();
  if (!allowedExtensions.has(extension)) {
    throw new ContentValidationError(
      `Unsupported file extension "${extension}" for ${filePath}. Supported: ${[...allowedExtensions].join(', ')}`,
    );
  }
  return filePath;
}

export async function readFileAsBase64(filePath: string): Promise<string> {
  try {
    const contents = await readFile(filePath);
    return contents.toString('base64');
  } catch (err) {
    throw new ContentValidationError(`Failed to read file: ${filePath}`, { cause: err });
  }
}

export function toDataUrl(mimeType: string, base64Data: string): string {
  return `data:${mimeType};base64,${base64Data}`;
}
