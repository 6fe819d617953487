import { z } from "zod";

export const DEFAULT_SOURCE_EXTENSIONS = [
  ".cpp",
  ".cc",
  ".cxx",
  ".c",
  ".h",
  ".hh",
  ".hpp",
  ".hxx",
];

export const DEFAULT_MAX_SOURCE_BYTES = 10 * 1024 * 1024;

// --- Schemas ---

export const ServerConfigSchema = z.object({
  /** Server name announced to MCP clients (default: 'call-graph-mcp') */
  name: z.string().min(1).default("call-graph-mcp"),
});

export const AnalysisConfigSchema = z.object({
  /** Largest source accepted by analyze_codebase, in bytes (default: 10 MiB) */
  maxSourceBytes: z.number().int().positive().default(DEFAULT_MAX_SOURCE_BYTES),
});

export const PreloadConfigSchema = z.object({
  /** Directory analyzed at startup (relative to the config file) */
  directory: z.string().min(1),
  /** File extensions to include (default: C and C++ sources and headers) */
  extensions: z
    .array(z.string().regex(/^\.[\w+-]+$/, "Extension must start with '.'"))
    .min(1)
    .default(DEFAULT_SOURCE_EXTENSIONS),
});

export const CallGraphConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
  /** Source tree to analyze on startup (optional) */
  preload: PreloadConfigSchema.optional(),
});

// --- Inferred Types ---

export type CallGraphConfig = z.infer<typeof CallGraphConfigSchema>;
export type CallGraphConfigInput = z.input<typeof CallGraphConfigSchema>;
