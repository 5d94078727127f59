import { encodeName, createBoundary } from './multipartEncoding';
import {
  bytesToBinaryString,
  binaryStringToBytes,
  utf8ToBinaryString,
} from './conversions';
import {
  CRLF,
  BOUNDARY_HYPHEN_CHARS,
  DEFAULT_CONTENT_TYPE,
  defaultFileReader,
  defaultMimeResolver,
  defaultSerializer,
  type FileReader,
  type FormDataBuilderOptions,
  type JsonSerializer,
  type MimeResolver,
} from './multipartShared';

/** Field name used for files added by path */
const FILE_FIELD_NAME = 'file';

const LINE_BREAK_CHARS = /[\r\n]/;

interface ContentDispositionParams {
  name: string;
  filename?: string;
  type?: string;
}

const makeFormHeader = (
  boundary: string,
  params: ContentDispositionParams
): string => {
  let header = BOUNDARY_HYPHEN_CHARS + boundary + CRLF;
  header += `Content-Disposition: form-data; name="${encodeName(params.name)}"`;
  if (params.filename != null) {
    header += `; filename="${encodeName(params.filename)}"`;
  }
  if (params.type != null) {
    if (LINE_BREAK_CHARS.test(params.type)) {
      throw new TypeError(
        `Content-Type for "${encodeName(params.name)}" must not contain line breaks`
      );
    }
    header += `${CRLF}Content-Type: ${params.type}`;
  }
  header += CRLF;
  header += CRLF;
  return utf8ToBinaryString(header);
};

const basename = (filePath: string): string => {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? filePath;
};

export const multipartContentType = (boundary: string) =>
  `multipart/form-data; boundary=${boundary}`;

/** Accumulates form parts in order and renders them as a `multipart/form-data` body
 * @remarks
 * The body is rendered as a binary string: every character holds exactly one octet.
 * Text values and headers are stored as their UTF-8 octets and file contents byte for byte,
 * so `getBytes()` (or `Buffer.from(body, 'latin1')`) reproduces the exact wire bytes.
 *
 * A builder isn't safe to mutate from concurrent callers.
 */
export class FormDataBuilder {
  #boundary: string;
  #parts: string[] = [];
  #resolveMimeType: MimeResolver;
  #readFile: FileReader;
  #serialize: JsonSerializer;

  constructor(options?: FormDataBuilderOptions) {
    this.#boundary = createBoundary();
    this.#resolveMimeType = options?.resolveMimeType ?? defaultMimeResolver;
    this.#readFile = options?.readFile ?? defaultFileReader;
    this.#serialize = options?.serialize ?? defaultSerializer;
  }

  /** Adds a text field. Empty values are skipped */
  addField(name: string, value: string | null | undefined): this {
    if (value) {
      this.#parts.push(
        makeFormHeader(this.#boundary, { name }) + utf8ToBinaryString(value)
      );
    }
    return this;
  }

  /** Reads a file and adds it as the `file` field, named after the path's last segment.
   * Empty paths are skipped and read errors are thrown as is.
   */
  addFile(filePath: string): this;
  /** Adds a file part. `content` is either raw bytes or text, which is sent as UTF-8.
   * Unlike fields, empty files are always added.
   */
  addFile(
    name: string,
    filename: string,
    mime: string,
    content: Uint8Array | string
  ): this;
  addFile(
    nameOrPath: string,
    filename?: string,
    mime?: string,
    content?: Uint8Array | string
  ): this {
    if (filename === undefined) {
      if (!nameOrPath) return this;
      const bytes = this.#readFile(nameOrPath);
      const name = basename(nameOrPath);
      return this.#appendFile(
        FILE_FIELD_NAME,
        name,
        this.#resolveMimeType(name),
        bytesToBinaryString(bytes)
      );
    }
    return this.#appendFile(
      nameOrPath,
      filename,
      mime,
      typeof content === 'string'
        ? utf8ToBinaryString(content)
        : bytesToBinaryString(content ?? new Uint8Array(0))
    );
  }

  /** Adds a value as a JSON text field. `null` and `undefined` are skipped */
  addObject(name: string, value: unknown): this {
    if (value == null) return this;
    return this.addField(name, this.#serialize(value));
  }

  #appendFile(
    name: string,
    filename: string,
    mime: string | undefined,
    binaryContent: string
  ): this {
    this.#parts.push(
      makeFormHeader(this.#boundary, {
        name,
        filename,
        type: mime || DEFAULT_CONTENT_TYPE,
      }) + binaryContent
    );
    return this;
  }

  /** Renders all parts as a binary string, or `''` if nothing was added */
  getBody(): string {
    if (!this.#parts.length) return '';
    return (
      this.#parts.join(CRLF) +
      CRLF +
      BOUNDARY_HYPHEN_CHARS +
      this.#boundary +
      BOUNDARY_HYPHEN_CHARS +
      CRLF
    );
  }

  /** Renders all parts as the bytes to send */
  getBytes(): Uint8Array<ArrayBuffer> {
    return binaryStringToBytes(this.getBody());
  }

  getBoundary(): string {
    return this.#boundary;
  }
}

/** Creates a builder that already contains the file at `filePath` */
export function formDataFromFile(
  filePath: string,
  options?: FormDataBuilderOptions
): FormDataBuilder {
  return new FormDataBuilder(options).addFile(filePath);
}
