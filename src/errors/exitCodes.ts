/**
 * Fatal error → process exit status mapping used by the entry point
 */

import { EXIT_CODES } from "@/constants";
import {
  DatasetFormatError,
  DuplicateFilenameError,
  PackConfigError,
} from "./packErrors";

export function exitCodeFor(error: unknown): number {
  if (error instanceof PackConfigError) return EXIT_CODES.config;
  if (error instanceof DatasetFormatError) return EXIT_CODES.dataset;
  if (error instanceof DuplicateFilenameError) {
    return EXIT_CODES.duplicateFilename;
  }
  return EXIT_CODES.unexpected;
}
