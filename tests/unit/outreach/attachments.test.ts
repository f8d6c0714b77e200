import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  contentTypeFor,
  mergeAttachmentPaths,
  resolveAttachments,
} from '../../../src/domains/outreach/service/attachments.js';
import { AttachmentError } from '../../../src/domains/outreach/errors.js';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'outreach-attach-'));
  fs.writeFileSync(path.join(dir, 'a.pdf'), 'aaaa');
  fs.writeFileSync(path.join(dir, 'b.txt'), 'bb');
  fs.writeFileSync(path.join(dir, 'c.bin'), 'c');
  fs.mkdirSync(path.join(dir, 'folder'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('mergeAttachmentPaths', () => {
  it('puts the single path first, then list order, without duplicates', () => {
    expect(mergeAttachmentPaths('a', ['b', 'a', 'c'], '/base')).toEqual([
      { absolute: '/base/a', original: 'a' },
      { absolute: '/base/b', original: 'b' },
      { absolute: '/base/c', original: 'c' },
    ]);
  });

  it('treats paths that normalize to the same file as duplicates', () => {
    expect(mergeAttachmentPaths('./a', ['/base/a', 'sub/../a'], '/base')).toEqual([
      { absolute: '/base/a', original: './a' },
    ]);
  });

  it('returns an empty list when neither input is given', () => {
    expect(mergeAttachmentPaths(null, null, '/base')).toEqual([]);
    expect(mergeAttachmentPaths(undefined, [], '/base')).toEqual([]);
  });
});

describe('resolveAttachments', () => {
  it('resolves the union in merge order with metadata', async () => {
    const set = await resolveAttachments('a.pdf', ['b.txt', 'a.pdf', 'c.bin'], { baseDir: dir });

    expect(set.map((h) => h.filename)).toEqual(['a.pdf', 'b.txt', 'c.bin']);
    expect(set[0]).toEqual({
      path: path.join(dir, 'a.pdf'),
      filename: 'a.pdf',
      contentType: 'application/pdf',
      sizeBytes: 4,
    });
    expect(set[1].contentType).toBe('text/plain');
    expect(set[2].contentType).toBe('application/octet-stream');
  });

  it('returns an empty set with no inputs', async () => {
    expect(await resolveAttachments(null, null, { baseDir: dir })).toEqual([]);
  });

  it('fails with NotFound naming the path as given', async () => {
    const error = await resolveAttachments(null, ['b.txt', 'missing.pdf'], { baseDir: dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AttachmentError);
    if (error instanceof AttachmentError) {
      expect(error.kind).toBe('NotFound');
      expect(error.path).toBe('missing.pdf');
      expect(error.message).toBe('Attachment not found: missing.pdf');
    }
  });

  it('reports a duplicated missing path as first spelled', async () => {
    await expect(resolveAttachments('./missing.pdf', ['missing.pdf'], { baseDir: dir })).rejects.toThrow(
      'Attachment not found: ./missing.pdf'
    );
  });

  it('rejects a directory', async () => {
    await expect(resolveAttachments('folder', null, { baseDir: dir })).rejects.toThrow('Attachment not found: folder');
  });

  it('accepts absolute paths regardless of base directory', async () => {
    const set = await resolveAttachments(path.join(dir, 'b.txt'), null, { baseDir: '/somewhere/else' });
    expect(set.map((h) => h.path)).toEqual([path.join(dir, 'b.txt')]);
  });
});

describe('contentTypeFor', () => {
  it('matches extensions case-insensitively', () => {
    expect(contentTypeFor('Catalog.PDF')).toBe('application/pdf');
    expect(contentTypeFor('photo.jpeg')).toBe('image/jpeg');
    expect(contentTypeFor('README')).toBe('application/octet-stream');
  });
});
