/**
 * Pack packager public API
 */

export {
  snippetFilename,
  serializeSnippet,
  toSnippetFileContent,
} from "./snippetFile";
export {
  renderManifest,
  parseManifest,
  parsePlistStrings,
  escapeXml,
  unescapeXml,
} from "./manifest";
export { planPackEntries } from "./planEntries";
export { renderPackArchive } from "./archive";
export { writeArchiveAtomic } from "./writeArchive";
