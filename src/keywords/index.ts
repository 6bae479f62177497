export { deriveKeywords } from "./deriveKeywords";
