// =============================================================================
// COURSEWORK — Route Helpers
// =============================================================================

/// <reference types="multer" />

import { Request } from 'express';
import { UploadedFile } from '../types/records';

/** The JSON or urlencoded body as a flat field map; anything else is empty. */
export function bodyFields(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

/** The multer file under a single-file field, in pipeline shape. */
export function uploadedFile(req: Request): UploadedFile | undefined {
  const file = req.file;
  if (!file) return undefined;
  return {
    originalName: file.originalname,
    mimeType: file.mimetype,
    sizeBytes: file.size,
    buffer: file.buffer,
  };
}

/** A route parameter; Express always sets the declared ones. */
export function param(req: Request, name: string): string {
  const value: unknown = req.params[name];
  return typeof value === 'string' ? value : '';
}
