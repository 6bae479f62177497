export { compilePack } from "./compilePack";
export { buildSnippetPack } from "./buildSnippetPack";
