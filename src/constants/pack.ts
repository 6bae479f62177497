/**
 * Snippet pack layout constants
 *
 * File names and field values expected by the Alfred snippet importer.
 */

/** Leading segment of every snippet uid: emojipack-<keyword>-<name> */
export const SNIPPET_UID_NAMESPACE = "emojipack";

export const SNIPPET_FILE_EXTENSION = ".json";

export const MANIFEST_FILENAME = "info.plist";

export const ICON_FILENAME = "icon.png";

/** Manifest keys read by the importer */
export const MANIFEST_PREFIX_KEY = "snippetkeywordprefix";
export const MANIFEST_SUFFIX_KEY = "snippetkeywordsuffix";

/**
 * Auto-expansion policy for every snippet (false = expansion enabled)
 */
export const SNIPPET_AUTO_EXPAND_DISABLED = false;

/**
 * Timestamp stamped on every archive entry.
 *
 * Zip entries carry a modification time; a fixed value keeps archives
 * byte-identical across builds. DOS time cannot represent dates before 1980.
 */
export const ARCHIVE_ENTRY_DATE = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

/** zlib level used for DEFLATE entries */
export const ARCHIVE_COMPRESSION_LEVEL = 9;

/**
 * Characters removed when a name or keyword is used in a filename
 */
export const FILENAME_RESERVED_PATTERN = /[/\\?%*:|"<>]/g;
