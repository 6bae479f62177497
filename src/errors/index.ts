/**
 * Error classes public API
 */

export {
  InvalidCodepointError,
  MalformedRecordError,
  DuplicateFilenameError,
  DatasetFormatError,
  PackConfigError,
  ManifestFormatError,
} from "./packErrors";
export { exitCodeFor } from "./exitCodes";
