/**
 * Dataset boundary public API
 */

export { parseEmojiDataset, loadEmojiDataset } from "./loader";
export { validateEmojiEntry, isRawEmojiEntry } from "./emojiValidation";
export { analyzeDatasetKeys, describeValueType } from "./analyzeKeys";
