import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  checkFileSize,
  formatBytes,
  hasPdfSignature,
  isPdfFile,
  scanSuspiciousElements,
} from '../pdf/pdf-validation.js';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'resume-scan-validation-'));
  await writeFile(path.join(dir, 'resume.pdf'), '%PDF-1.7\n1 0 obj\n<< /Type /Catalog >>\nendobj\n');
  await writeFile(path.join(dir, 'RESUME.PDF'), '%PDF-1.4\n');
  await writeFile(path.join(dir, 'resume.txt'), '%PDF-1.7\n');
  await writeFile(path.join(dir, 'fake.pdf'), 'hello world');
  await writeFile(path.join(dir, 'hundred.pdf'), Buffer.alloc(100, 0x20));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('isPdfFile', () => {
  it('accepts a .pdf file with a PDF signature', async () => {
    expect(await isPdfFile(path.join(dir, 'resume.pdf'))).toBe(true);
    expect(await isPdfFile(path.join(dir, 'RESUME.PDF'))).toBe(true);
  });

  it('rejects a wrong extension, a wrong signature and a missing file', async () => {
    expect(await isPdfFile(path.join(dir, 'resume.txt'))).toBe(false);
    expect(await isPdfFile(path.join(dir, 'fake.pdf'))).toBe(false);
    expect(await isPdfFile(path.join(dir, 'missing.pdf'))).toBe(false);
  });

  it('honours a custom extension list', async () => {
    expect(await isPdfFile(path.join(dir, 'resume.txt'), ['.txt'])).toBe(true);
  });
});

describe('hasPdfSignature', () => {
  it('needs the full five-byte header', () => {
    expect(hasPdfSignature(Buffer.from('%PDF-'))).toBe(true);
    expect(hasPdfSignature(Buffer.from('%PDF'))).toBe(false);
  });
});

describe('checkFileSize', () => {
  it('accepts files up to the limit', async () => {
    expect(await checkFileSize(path.join(dir, 'hundred.pdf'), 100)).toEqual({ ok: true });
  });

  it('rejects larger files with a readable message', async () => {
    expect(await checkFileSize(path.join(dir, 'hundred.pdf'), 50)).toEqual({
      ok: false,
      error: 'File is too large (100 B). Maximum allowed size is 50 B.',
    });
  });

  it('reports unreadable files', async () => {
    const result = await checkFileSize(path.join(dir, 'missing.pdf'), 50);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Cannot read file: ')).toBe(true);
  });
});

describe('formatBytes', () => {
  it('scales to KB and MB', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(2048)).toBe('2.0 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});

describe('scanSuspiciousElements', () => {
  it('counts every marker', () => {
    const counts = scanSuspiciousElements(Buffer.from('/JS /JavaScript /AA /OpenAction /OpenAction'));

    expect(counts).toEqual({
      '/JS': 1,
      '/JavaScript': 1,
      '/AA': 1,
      '/OpenAction': 2,
      '/Launch': 0,
      '/EmbeddedFile': 0,
      '/AcroForm': 0,
      '/RichMedia': 0,
    });
  });
});
