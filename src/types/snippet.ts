/**
 * Snippet and pack type definitions
 */

/**
 * One keyword → emoji expansion rule (one per emoji × shortcode pair)
 */
export type SnippetRecord = {
  /** Decoded glyph sequence */
  readonly character: string;
  /** The shortcode, verbatim (prefix/suffix live in the manifest) */
  readonly keyword: string;
  /** "😀 Grinning Face, smiling" */
  readonly displayName: string;
  /** Deterministic identifier, stable across rebuilds */
  readonly uid: string;
  readonly autoExpandDisabled: boolean;
  /** Filesystem-safe form of the emoji name, shared by uid and filename */
  readonly sanitizedName: string;
};

/**
 * Pack-level keyword settings applied by the destination application at lookup time
 */
export type PackManifest = {
  keywordPrefix: string;
  keywordSuffix: string;
};

/**
 * A snippet and the archive filename it is stored under
 */
export type PackEntry = {
  filename: string;
  snippet: SnippetRecord;
};

/**
 * Ordered snippet entries plus the manifest.
 *
 * Filenames are unique within a pack.
 */
export type CompiledPack = {
  entries: PackEntry[];
  manifest: PackManifest;
};

/**
 * Wire shape of a snippet file inside the archive
 */
export type SnippetFileContent = {
  alfredsnippet: {
    snippet: string;
    uid: string;
    name: string;
    keyword: string;
    dontautoexpand: boolean;
  };
};

/**
 * Options for rendering the archive
 */
export type RenderArchiveOptions = {
  /** PNG bytes bundled as icon.png */
  icon?: Uint8Array;
};
