/**
 * File checks run when a PDF is selected: extension and magic number, size
 * ceiling, and a byte-level count of PDF features commonly abused by
 * malicious documents.
 */

import { open, stat } from 'node:fs/promises';
import path from 'node:path';
import logger from '../lib/logger.js';

const PDF_MAGIC = Buffer.from('%PDF-', 'latin1');

export const SUSPICIOUS_MARKERS = [
  '/JS', // JavaScript in PDF
  '/JavaScript', // JavaScript object
  '/AA', // auto-action, triggers on open
  '/OpenAction', // action on document open
  '/Launch', // launch external program
  '/EmbeddedFile', // embedded files
  '/AcroForm', // interactive forms
  '/RichMedia', // embedded media (Flash, video)
] as const;

export type SuspiciousMarker = (typeof SUSPICIOUS_MARKERS)[number];
export type SuspiciousElementCounts = Record<SuspiciousMarker, number>;

export type FileCheckResult = { ok: true } | { ok: false; error: string };

export function hasAllowedExtension(filePath: string, allowedExtensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return allowedExtensions.some((allowed) => allowed.toLowerCase() === ext);
}

export function hasPdfSignature(header: Uint8Array): boolean {
  return header.length >= PDF_MAGIC.length && PDF_MAGIC.equals(header.subarray(0, PDF_MAGIC.length));
}

/** Genuine PDF: allowed extension and a `%PDF-` signature. Unreadable files are not PDFs. */
export async function isPdfFile(filePath: string, allowedExtensions: readonly string[] = ['.pdf']): Promise<boolean> {
  if (!hasAllowedExtension(filePath, allowedExtensions)) {
    logger.debug({ filePath }, 'File rejected: extension not allowed');
    return false;
  }

  try {
    const handle = await open(filePath, 'r');
    try {
      const header = Buffer.alloc(PDF_MAGIC.length);
      const { bytesRead } = await handle.read(header, 0, PDF_MAGIC.length, 0);
      const valid = hasPdfSignature(header.subarray(0, bytesRead));
      if (!valid) logger.warn({ filePath }, 'File rejected: invalid PDF signature');
      return valid;
    } finally {
      await handle.close();
    }
  } catch (err) {
    logger.error({ err, filePath }, 'PDF validation failed');
    return false;
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function checkSize(sizeBytes: number, maxBytes: number): FileCheckResult {
  if (sizeBytes > maxBytes) {
    return {
      ok: false,
      error: `File is too large (${formatBytes(sizeBytes)}). Maximum allowed size is ${formatBytes(maxBytes)}.`,
    };
  }
  return { ok: true };
}

export async function checkFileSize(filePath: string, maxBytes: number): Promise<FileCheckResult> {
  try {
    const info = await stat(filePath);
    return checkSize(info.size, maxBytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Cannot read file: ${reason}` };
  }
}

function countOccurrences(haystack: Buffer, needle: Buffer): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/** Non-overlapping occurrence count of each marker in the raw file bytes. */
export function scanSuspiciousElements(bytes: Uint8Array): SuspiciousElementCounts {
  const haystack = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const counts = {} as SuspiciousElementCounts;
  for (const marker of SUSPICIOUS_MARKERS) {
    counts[marker] = countOccurrences(haystack, Buffer.from(marker, 'latin1'));
  }
  return counts;
}

export function flaggedElements(counts: SuspiciousElementCounts): Partial<SuspiciousElementCounts> {
  const found: Partial<SuspiciousElementCounts> = {};
  for (const marker of SUSPICIOUS_MARKERS) {
    if (counts[marker] > 0) found[marker] = counts[marker];
  }
  return found;
}
