/**
 * Configuration type definitions
 */

export type PackConfig = {
  /** Emoji dataset JSON file */
  datasetPath: string;
  /** Destination archive path */
  outputPath: string;
  keywordPrefix: string;
  keywordSuffix: string;
  maxRecords?: number;
  /** Optional PNG bundled into the pack as icon.png */
  iconPath?: string;
};
