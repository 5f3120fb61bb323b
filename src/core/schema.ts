import { z } from "zod";

// --- Constants ---

export const CONFIG_FILENAME = ".mockwright.yaml";
export const INTERFACE_LIST_FILENAME = "interfaces_to_mock";
export const DEFAULT_RUNTIME_MODULE = "mockwright/runtime";
export const DEFAULT_MATCHERS_DIRNAME = "matchers";
export const DEFAULT_WATCH_INTERVAL_MS = 2000;

// --- Config file schema ---

export const importExtensionSchema = z
  .enum(["", ".js", ".ts"])
  .describe("Suffix appended to relative imports in generated files");

export const configSchema = z
  .object({
    runtime_module: z.string().min(1).optional().describe("Module specifier generated mocks import the runtime from"),
    import_extension: importExtensionSchema.optional(),
    matchers_dir: z.string().min(1).optional().describe("Matcher destination, relative to the mock directory"),
    generate_matchers: z.boolean().optional().describe("Generate argument matchers by default"),
    watch_interval: z.number().int().positive().optional().describe("Watcher poll interval in milliseconds"),
  })
  .strict();

export type ConfigFile = z.infer<typeof configSchema>;
