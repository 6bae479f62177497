/**
 * Snippet assembly public API
 */

export {
  assembleSnippets,
  buildSnippet,
  compileSnippets,
  composeDisplayName,
  snippetUid,
} from "./assembleSnippets";
