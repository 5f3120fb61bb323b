import { relative, resolve } from "node:path";
import { backendFor } from "../extract/index.js";
import { checkRequest, normalizeModulePath, parseSourceArgs, resolveDestination } from "../core/destination.js";
import { ExtractionError, GenerationError, SignatureConstraintError, UsageError } from "../core/errors.js";
import { runGeneration, type GenerationResult } from "../core/pipeline.js";
import { InvalidConfigError } from "../core/writer.js";
import { loadSettings } from "../utils/config.js";
import { dim, errorMsg, successMsg } from "../utils/display.js";

export interface GenerateCommandOptions {
  output?: string;
  outputDir?: string;
  packageName?: string;
  selfPackage?: string;
  debug?: boolean;
  generateMatchers?: boolean;
  matchersDir?: string;
  syntactic?: boolean;
  /** Working directory; defaults to the process's */
  path?: string;
}

/** Errors reported as a one-line message rather than a stack trace. */
export function isReportable(err: unknown): err is Error {
  return (
    err instanceof ExtractionError ||
    err instanceof GenerationError ||
    err instanceof SignatureConstraintError ||
    err instanceof UsageError ||
    err instanceof InvalidConfigError
  );
}

export async function generateCommand(
  args: string[],
  options: GenerateCommandOptions,
): Promise<GenerationResult | null> {
  const cwd = resolve(options.path ?? ".");

  try {
    const settings = await loadSettings(cwd);
    const spec = parseSourceArgs(args, cwd);
    checkRequest(spec, options);

    const result = await runGeneration({
      cwd,
      spec,
      backend: backendFor(spec, options.syntactic ?? false),
      destination: resolveDestination(
        { output: options.output, outputDir: options.outputDir, packageName: options.packageName, matchersDir: options.matchersDir },
        cwd,
        settings.matchersDir,
      ),
      selfPackagePath: options.selfPackage !== undefined ? normalizeModulePath(options.selfPackage, cwd) : undefined,
      runtimeModule: settings.runtimeModule,
      importExtension: settings.importExtension,
      generateMatchers: options.generateMatchers ?? settings.generateMatchers,
      debug: options.debug,
    });

    for (const path of result.written) console.log(successMsg(relative(cwd, path)));
    for (const path of result.unchanged) console.log(dim(`  ${relative(cwd, path)} (unchanged)`));
    return result;
  } catch (err) {
    if (!isReportable(err)) throw err;
    console.error(errorMsg(err.message));
    process.exitCode = 1;
    return null;
  }
}
