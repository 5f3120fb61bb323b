import { existsSync } from "node:fs";
import { join } from "node:path";
import {
  Node,
  Project,
  ts,
  type InterfaceDeclaration,
  type SourceFile,
  type TypeAliasDeclaration,
} from "ts-morph";
import { ExtractionError } from "../core/errors.js";

const BASE_OPTIONS: ts.CompilerOptions = {
  strictNullChecks: true,
  noEmit: true,
  skipLibCheck: true,
};

/**
 * Create a ts-morph project for `cwd`, honouring its tsconfig.json when there
 * is one. strictNullChecks is always on: without it `null` and `undefined`
 * disappear from the checker's unions.
 */
export function createProject(cwd: string): Project {
  const tsConfigFilePath = join(cwd, "tsconfig.json");
  if (existsSync(tsConfigFilePath)) {
    return new Project({
      tsConfigFilePath,
      skipAddingFilesFromTsConfig: true,
      compilerOptions: BASE_OPTIONS,
    });
  }
  return new Project({
    compilerOptions: {
      ...BASE_OPTIONS,
      strict: true,
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      moduleResolution: ts.ModuleResolutionKind.Bundler,
    },
  });
}

/** Resolve a module specifier the way an import written in `cwd` would. */
export function resolveModule(project: Project, specifier: string, cwd: string): string | undefined {
  const containingFile = join(cwd, "__mockwright__.ts");
  const result = ts.resolveModuleName(specifier, containingFile, project.getCompilerOptions(), ts.sys);
  return result.resolvedModule?.resolvedFileName;
}

/** Add a file to the project and fail on syntax errors. */
export function loadSourceFile(project: Project, filePath: string): SourceFile {
  const sourceFile = project.addSourceFileAtPath(filePath);
  project.resolveSourceFileDependencies();

  const diagnostics = project.getProgram().compilerObject.getSyntacticDiagnostics(sourceFile.compilerNode);
  if (diagnostics.length > 0) {
    const first = diagnostics[0];
    const message = ts.flattenDiagnosticMessageText(first.messageText, "\n");
    const line = first.start !== undefined ? sourceFile.getLineAndColumnAtPos(first.start).line : undefined;
    throw new ExtractionError(
      `Cannot parse ${filePath}${line !== undefined ? `:${line}` : ""}: ${message}`,
      filePath,
    );
  }
  return sourceFile;
}

/** Files the project has loaded so far, minus installed packages. */
export function projectSourceFiles(project: Project): string[] {
  return project
    .getSourceFiles()
    .map((file) => file.getFilePath().toString())
    .filter((path) => !path.includes("/node_modules/"))
    .sort();
}

/** Declarations that can be mocked: interfaces and aliases of object type literals. */
export type MockableDeclaration = InterfaceDeclaration | TypeAliasDeclaration;

export function isMockable(node: Node): node is MockableDeclaration {
  if (Node.isInterfaceDeclaration(node)) return true;
  return Node.isTypeAliasDeclaration(node) && Node.isTypeLiteral(node.getTypeNode());
}

/** Find an exported interface by its exported name. */
export function findExportedInterface(sourceFile: SourceFile, name: string, moduleLabel: string): MockableDeclaration {
  const declarations = sourceFile.getExportedDeclarations().get(name) ?? [];
  const found = declarations.find(isMockable);
  if (found) return found;
  if (declarations.length > 0) {
    throw new ExtractionError(`${name} in ${moduleLabel} is not an interface`, name);
  }
  throw new ExtractionError(`Interface ${name} not found in ${moduleLabel}`, name);
}
