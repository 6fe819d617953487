import { createRequire } from "node:module";
import type { TreeSitterLanguage, TreeSitterParser } from "./treeSitterTypes.js";

const require = createRequire(import.meta.url);

/** Whether tree-sitter-cpp is available (null until first check) */
let cppAvailable: boolean | null = null;

let cachedTreeSitter: (new () => TreeSitterParser) | null = null;

let cachedCppLanguage: TreeSitterLanguage | null = null;

let loadingError: string | null = null;

/**
 * Check if tree-sitter and tree-sitter-cpp can be loaded.
 * Tries once and caches the outcome.
 */
export function isCppTreeSitterAvailable(): boolean {
  if (cppAvailable !== null) {
    return cppAvailable;
  }

  try {
    loadCppTreeSitter();
    cppAvailable = true;
  } catch (error) {
    cppAvailable = false;
    loadingError =
      error instanceof Error
        ? error.message
        : "Unknown error loading tree-sitter-cpp";
  }

  return cppAvailable;
}

/**
 * Create a tree-sitter parser configured for C++.
 *
 * @throws Error if tree-sitter or tree-sitter-cpp is not available
 */
export function createCppParser(): TreeSitterParser {
  if (!isCppTreeSitterAvailable() || !cachedTreeSitter || !cachedCppLanguage) {
    throw new Error(
      `tree-sitter-cpp is not available: ${loadingError ?? "unknown error"}`,
    );
  }

  const Parser = cachedTreeSitter;
  const parser = new Parser();
  parser.setLanguage(cachedCppLanguage);

  return parser;
}

/**
 * Loading error message, or null if the grammar loaded.
 */
export function getCppLoadingError(): string | null {
  isCppTreeSitterAvailable();
  return loadingError;
}

function loadCppTreeSitter(): void {
  if (cachedTreeSitter && cachedCppLanguage) {
    return;
  }

  try {
    cachedTreeSitter = require("tree-sitter") as new () => TreeSitterParser;
  } catch (error) {
    throw new Error(
      `Failed to load tree-sitter: ${error instanceof Error ? error.message : "unknown error"}. ` +
        "Install with: npm install tree-sitter tree-sitter-cpp",
    );
  }

  try {
    cachedCppLanguage = require("tree-sitter-cpp") as TreeSitterLanguage;
  } catch (error) {
    cachedTreeSitter = null;
    throw new Error(
      `Failed to load tree-sitter-cpp: ${error instanceof Error ? error.message : "unknown error"}. ` +
        "Install with: npm install tree-sitter-cpp",
    );
  }
}
