export {
  bytesToBinaryString,
  binaryStringToBytes,
  utf8ToBinaryString,
} from './conversions';
export {
  createBoundary,
  encodeName,
  BOUNDARY_PREFIX,
} from './multipartEncoding';
export {
  CRLF,
  DEFAULT_CONTENT_TYPE,
  type FormDataBuilderOptions,
  type MimeResolver,
  type FileReader,
  type JsonSerializer,
} from './multipartShared';
export {
  FormDataBuilder,
  formDataFromFile,
  multipartContentType,
} from './multipartOutput';
