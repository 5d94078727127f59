import { expect } from 'vitest';

const CRLF = '\r\n';
const HEADER_TERMINATOR = CRLF + CRLF;

export interface ParsedPart {
  headers: string[];
  content: string;
}

/** Splits a rendered body back into its parts, asserting the framing along the way */
export function parseBody(body: string, boundary: string): ParsedPart[] {
  const delimiter = `--${boundary}`;
  const footer = `${delimiter}--${CRLF}`;
  expect(body.endsWith(footer)).toBe(true);
  expect(body.startsWith(delimiter + CRLF)).toBe(true);

  const sections = body.slice(0, -footer.length).split(delimiter + CRLF);
  // The body starts with a delimiter, so the first section is always empty
  expect(sections.shift()).toBe('');

  return sections.map(section => {
    expect(section.endsWith(CRLF)).toBe(true);
    const headerEnd = section.indexOf(HEADER_TERMINATOR);
    expect(headerEnd).toBeGreaterThan(-1);
    return {
      headers: section.slice(0, headerEnd).split(CRLF),
      content: section.slice(
        headerEnd + HEADER_TERMINATOR.length,
        -CRLF.length
      ),
    };
  });
}

export function allByteValues(): Uint8Array {
  const bytes = new Uint8Array(256);
  for (let idx = 0; idx < bytes.length; idx++) bytes[idx] = idx;
  return bytes;
}
