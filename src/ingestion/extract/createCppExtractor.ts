import { ParseUnavailableError } from "../../service/CallGraphError.js";
import type {
  ExtractedFunction,
  ExtractionResult,
  SkippedRegion,
  SourceExtractor,
} from "../ExtractionTypes.js";
import { createCppParser } from "./cppTreeSitterLoader.js";
import type { TreeSitterNode, TreeSitterParser } from "./treeSitterTypes.js";

// Keeps each read below the binding's internal buffer size
const PARSE_CHUNK_SIZE = 16 * 1024;

const PREVIEW_LENGTH = 40;

/** Declarators that wrap the one carrying the name. */
const WRAPPING_DECLARATORS = new Set([
  "function_declarator",
  "parenthesized_declarator",
  "pointer_declarator",
  "reference_declarator",
  "attributed_declarator",
]);

/** Declarators whose text is the function name. */
const NAME_DECLARATORS = new Set([
  "identifier",
  "field_identifier",
  "qualified_identifier",
  "destructor_name",
  "operator_name",
]);

const compact = (text: string): string => text.replace(/\s+/g, "");

/**
 * Name of a `function_definition`, following nested declarators down to the
 * identifier: `int *(*make)(int)` → "make", `Account::deposit` stays
 * qualified. Returns null for shapes without a usable name.
 */
export const extractFunctionName = (
  definition: TreeSitterNode,
): string | null => {
  let current = definition.childForFieldName("declarator");

  while (current) {
    if (NAME_DECLARATORS.has(current.type)) {
      return compact(current.text);
    }
    if (current.type === "template_function") {
      const name = current.childForFieldName("name");
      return name ? compact(name.text) : null;
    }
    if (!WRAPPING_DECLARATORS.has(current.type)) {
      return null;
    }
    // reference and parenthesized declarators carry no field name
    current =
      current.childForFieldName("declarator") ??
      current.namedChildren[current.namedChildren.length - 1] ??
      null;
  }

  return null;
};

/**
 * Name of the function a call expression invokes: plain and qualified names
 * as written, the member name for `obj.f()` / `ptr->f()`, the template name
 * for `max<int>()`. Calls through other expressions are skipped.
 */
export const extractCalleeName = (call: TreeSitterNode): string | null => {
  const target = call.childForFieldName("function");
  if (!target) {
    return null;
  }

  switch (target.type) {
    case "identifier":
    case "qualified_identifier":
      return compact(target.text);
    case "field_expression": {
      const field = target.childForFieldName("field");
      return field ? compact(field.text) : null;
    }
    case "template_function": {
      const name = target.childForFieldName("name");
      return name ? compact(name.text) : null;
    }
    default:
      return null;
  }
};

const hasErrorAncestor = (node: TreeSitterNode): boolean => {
  for (let parent = node.parent; parent; parent = parent.parent) {
    if (parent.type === "ERROR") {
      return true;
    }
  }
  return false;
};

const toSkippedRegion = (node: TreeSitterNode): SkippedRegion => ({
  startLine: node.startPosition.row + 1,
  endLine: node.endPosition.row + 1,
  preview: node.text.replace(/\s+/g, " ").trim().slice(0, PREVIEW_LENGTH),
});

const parseSource = (parser: TreeSitterParser, source: string) =>
  parser.parse((index) => source.slice(index, index + PARSE_CHUNK_SIZE));

/**
 * C++ extractor on tree-sitter-cpp.
 *
 * Every `function_definition` anywhere in the tree becomes a record with the
 * calls found in its body, in source order. tree-sitter recovers from syntax
 * errors, so malformed regions turn into ERROR nodes that are reported as
 * skipped instead of failing the parse.
 *
 * @throws ParseUnavailableError if tree-sitter or the C++ grammar cannot be
 * loaded, or the parser itself fails
 */
export const createCppExtractor = (): SourceExtractor => ({
  language: "C++",

  extract(source: string): ExtractionResult {
    let rootNode: TreeSitterNode;
    try {
      rootNode = parseSource(createCppParser(), source).rootNode;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseUnavailableError(message, { cause: error });
    }

    const functions: ExtractedFunction[] = [];
    for (const definition of rootNode.descendantsOfType("function_definition")) {
      const name = extractFunctionName(definition);
      if (!name) continue;

      const callees = new Set<string>();
      for (const call of definition.descendantsOfType("call_expression")) {
        const callee = extractCalleeName(call);
        if (callee) {
          callees.add(callee);
        }
      }
      functions.push({ name, callees });
    }

    const skippedRegions = rootNode
      .descendantsOfType("ERROR")
      .filter((node) => !hasErrorAncestor(node))
      .map(toSkippedRegion);

    return { functions, skippedRegions };
  },
});
