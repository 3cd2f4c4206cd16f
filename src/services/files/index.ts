// =============================================================================
// COURSEWORK — File Storage
//
// Uploaded submission files are stored under generated names; the
// original name travels in the FileRef only.
// =============================================================================

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FileRef, UploadedFile } from '../../types/records';

export interface FileStore {
  save(upload: UploadedFile): Promise<FileRef>;
  read(storageRef: string): Promise<Buffer | null>;
}

function storedName(originalName: string): string {
  const extension = path.extname(originalName).toLowerCase();
  return /^\.[a-z0-9]{1,10}$/.test(extension) ? `${uuidv4()}${extension}` : uuidv4();
}

function toFileRef(storageRef: string, upload: UploadedFile): FileRef {
  return {
    storageRef,
    originalName: upload.originalName,
    mimeType: upload.mimeType,
    sizeBytes: upload.sizeBytes,
  };
}

export class DiskFileStore implements FileStore {
  constructor(private readonly directory: string) {}

  async save(upload: UploadedFile): Promise<FileRef> {
    await fs.mkdir(this.directory, { recursive: true });
    const name = storedName(upload.originalName);
    await fs.writeFile(path.join(this.directory, name), upload.buffer);
    return toFileRef(name, upload);
  }

  async read(storageRef: string): Promise<Buffer | null> {
    // Stored names never contain a separator
    if (path.basename(storageRef) !== storageRef) return null;
    try {
      return await fs.readFile(path.join(this.directory, storageRef));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
  }
}

export class MemoryFileStore implements FileStore {
  private readonly files = new Map<string, Buffer>();

  async save(upload: UploadedFile): Promise<FileRef> {
    const name = storedName(upload.originalName);
    this.files.set(name, Buffer.from(upload.buffer));
    return toFileRef(name, upload);
  }

  async read(storageRef: string): Promise<Buffer | null> {
    return this.files.get(storageRef) ?? null;
  }

  get size(): number {
    return this.files.size;
  }
}
