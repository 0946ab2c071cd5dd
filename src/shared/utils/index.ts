// File path utilities
export { expandHome, normalizePath } from "./file-path";
// Shell quoting
export { shellQuote } from "./shell-quote";
