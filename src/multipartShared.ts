import fs from 'node:fs';

export const CRLF = '\r\n';
export const BOUNDARY_HYPHEN_CHARS = '--';
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/** Resolves a content type for a filename. Should fall back to a default rather than throw */
export type MimeResolver = (filename: string) => string;

/** Reads a file's contents. Errors are passed through to the caller of `addFile` */
export type FileReader = (filePath: string) => Uint8Array;

/** Serializes a value to compact JSON text */
export type JsonSerializer = (value: unknown) => string | undefined;

export interface FormDataBuilderOptions {
  resolveMimeType?: MimeResolver;
  readFile?: FileReader;
  serialize?: JsonSerializer;
}

export const defaultMimeResolver: MimeResolver = () => DEFAULT_CONTENT_TYPE;

export const defaultFileReader: FileReader = filePath =>
  fs.readFileSync(filePath);

export const defaultSerializer: JsonSerializer = value => JSON.stringify(value);
