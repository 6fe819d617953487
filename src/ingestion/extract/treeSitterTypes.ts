/**
 * The slice of the tree-sitter Node API used by the C++ extractor.
 * tree-sitter is an optional dependency loaded at run time, so its own
 * typings may be absent; these mirror the parts we call.
 */

export interface TreeSitterPoint {
  /** 0-indexed line */
  row: number;
  column: number;
}

export interface TreeSitterNode {
  type: string;
  text: string;
  startPosition: TreeSitterPoint;
  endPosition: TreeSitterPoint;
  parent: TreeSitterNode | null;
  namedChildren: TreeSitterNode[];
  childForFieldName(fieldName: string): TreeSitterNode | null;
  descendantsOfType(types: string | string[]): TreeSitterNode[];
}

export interface TreeSitterTree {
  rootNode: TreeSitterNode;
}

/**
 * Chunked input: called with a UTF-16 offset, returns the text from there
 * (an empty string ends the input).
 */
export type TreeSitterInput = (index: number) => string | null;

/** A compiled grammar, opaque to callers. */
export type TreeSitterLanguage = object;

export interface TreeSitterParser {
  setLanguage(language: TreeSitterLanguage): void;
  parse(input: string | TreeSitterInput): TreeSitterTree;
}
