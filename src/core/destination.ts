import { basename, dirname, isAbsolute, join, resolve } from "node:path";
import type { SourceSpec } from "../extract/types.js";
import { defaultMockFileName } from "../generator/naming.js";
import { UsageError } from "./errors.js";
import { DEFAULT_MATCHERS_DIRNAME } from "./schema.js";

export interface DestinationFlags {
  output?: string;
  outputDir?: string;
  packageName?: string;
  matchersDir?: string;
}

/** Where one run writes, with every path absolute. */
export interface Destination {
  /** Directory mocks are written to */
  outputDir: string;
  /** Exact file for the single mocked interface, when `--output` was given */
  outputPath?: string;
  packageName: string;
  matchersDir: string;
}

/**
 * Turn `generate` arguments into a SourceSpec: one `.ts` file optionally
 * followed by an interface name, or a module followed by interface names.
 */
export function parseSourceArgs(args: readonly string[], cwd: string): SourceSpec {
  if (args.length === 0) {
    throw new UsageError("Give a .ts source file, or a module followed by the interfaces to mock");
  }
  const [first, ...rest] = args;

  if (first.endsWith(".ts")) {
    if (rest.length > 1) {
      throw new UsageError(`A source file takes at most one interface name, got ${rest.length}`);
    }
    return { kind: "file", filePath: resolve(cwd, first), interfaceName: rest[0] };
  }

  if (rest.length === 0) {
    throw new UsageError(`Name at least one interface to mock from "${first}"`);
  }
  return { kind: "package", packagePath: first, interfaceNames: rest };
}

function interfaceCount(spec: SourceSpec): number {
  return spec.kind === "file" ? 1 : new Set(spec.interfaceNames).size;
}

/**
 * Reject flag combinations that cannot produce a well-defined run.
 */
export function checkRequest(spec: SourceSpec, flags: DestinationFlags & { syntactic?: boolean }): void {
  if (flags.output !== undefined && flags.outputDir !== undefined) {
    throw new UsageError("--output and --output-dir cannot be used together");
  }
  if (flags.output !== undefined && interfaceCount(spec) > 1) {
    throw new UsageError("--output needs exactly one interface; use --output-dir for several");
  }
  if (flags.syntactic && interfaceCount(spec) > 1) {
    throw new UsageError("--syntactic mocks one interface per run");
  }
}

/**
 * Resolve output paths and the package name from the flags.
 *
 * @param configMatchersDir matchers directory from the config file, relative
 *   to the mock directory
 */
export function resolveDestination(flags: DestinationFlags, cwd: string, configMatchersDir?: string): Destination {
  const outputPath = flags.output !== undefined ? resolve(cwd, flags.output) : undefined;
  const outputDir = outputPath ? dirname(outputPath) : resolve(cwd, flags.outputDir ?? ".");

  const packageName =
    flags.packageName ?? (flags.outputDir !== undefined ? basename(outputDir) : `${basename(cwd)}_test`);

  let matchersDir: string;
  if (flags.matchersDir !== undefined) matchersDir = resolve(cwd, flags.matchersDir);
  else if (configMatchersDir !== undefined) matchersDir = resolve(outputDir, configMatchersDir);
  else matchersDir = join(outputDir, DEFAULT_MATCHERS_DIRNAME);

  return { outputDir, outputPath, packageName, matchersDir };
}

export function destinationPathFor(
  destination: Destination,
  interfaceName: string,
  fileName = defaultMockFileName(interfaceName),
): string {
  return destination.outputPath ?? join(destination.outputDir, fileName);
}

/**
 * `--self-package` in the form NamedRef.packagePath uses: a package name as
 * given, a path made absolute with its `.ts` or `.js` suffix dropped.
 */
export function normalizeModulePath(specifier: string, cwd: string): string {
  if (!specifier.startsWith(".") && !isAbsolute(specifier)) return specifier;
  return resolve(cwd, specifier).replace(/\.(?:d\.)?[cm]?[tj]s$/, "");
}
