/**
 * Upload Handling
 *
 * Validation, filename sanitisation and on-disk storage for uploaded PDFs.
 */

import fs from 'fs';
import path from 'path';
import { InvalidRequestError } from '@contract-intel/shared';
import type { UploadStore } from './repository';

const PDF_MAGIC = '%PDF';
const FALLBACK_FILENAME = 'document.pdf';

/**
 * Reject anything that is not a non-empty PDF within the size limit.
 */
export function validateUpload(
  filename: string | undefined,
  content: Buffer,
  maxBytes: number
): string {
  if (!filename || filename.trim() === '') {
    throw new InvalidRequestError('X-Filename header is required');
  }
  if (!filename.toLowerCase().endsWith('.pdf')) {
    throw new InvalidRequestError(`${filename}: Not a PDF file`);
  }
  if (content.length === 0) {
    throw new InvalidRequestError(`${filename}: Empty file`);
  }
  if (content.length > maxBytes) {
    throw new InvalidRequestError(`${filename}: File exceeds ${maxBytes} bytes`);
  }
  if (content.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
    throw new InvalidRequestError(`${filename}: Not a PDF file`);
  }
  return filename.trim();
}

/**
 * Keep the last path component, drop characters outside [\w\s.-] and turn
 * whitespace runs into underscores.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const safe = base.replace(/[^\w\s.-]/g, '').replace(/\s+/g, '_');
  return safe === '' || /^\.+$/.test(safe) ? FALLBACK_FILENAME : safe;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function uploadTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function storedFilename(filename: string, now: Date = new Date()): string {
  return `${uploadTimestamp(now)}_${sanitizeFilename(filename)}`;
}

export class FileUploadStore implements UploadStore {
  constructor(private readonly uploadDir: string) {}

  async save(storedName: string, content: Buffer): Promise<string> {
    await fs.promises.mkdir(this.uploadDir, { recursive: true });
    const filePath = path.resolve(this.uploadDir, storedName);
    await fs.promises.writeFile(filePath, content);
    return filePath;
  }

  async remove(filePath: string): Promise<void> {
    await fs.promises.rm(filePath, { force: true });
  }
}
