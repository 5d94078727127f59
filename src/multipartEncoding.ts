import { v4 as uuidv4 } from 'uuid';

export const BOUNDARY_PREFIX = '----formdata-';

/** Creates a fresh boundary token from a random (v4) UUID */
export function createBoundary(): string {
  return BOUNDARY_PREFIX + uuidv4();
}

const pencode = (c: string) => {
  switch (c) {
    case '"':
      // Percent escape rather than '\"', so a naive receiver can't mistake it for the closing quote
      return '%22';
    case '\n':
      return '%0A';
    case '\r':
      return '%0D';
    default:
      return `%${c.charCodeAt(0).toString(16).toUpperCase()}`;
  }
};

const ENCODE_NAME_CHARS = /["\r\n]/g;

/** Encode a multipart name/filename (quotes must be added manually)
 * @remarks
 * There isn't a standard for this. Only the characters that would end the quoted
 * parameter or the header line are percent encoded, like browsers do.
 */
export function encodeName(input: string): string {
  return input.replace(ENCODE_NAME_CHARS, pencode);
}
