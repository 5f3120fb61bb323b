import { isAbsolute, relative, sep } from "node:path";
import { GenerationError } from "../core/errors.js";
import type { NamedRef } from "../model/types.js";

export type ImportExtension = "" | ".js" | ".ts";

export interface ImportContextOptions {
  /** Directory of the file being generated */
  fromDir: string;
  /** Module whose types are referenced without an import */
  selfPackagePath?: string;
  importExtension: ImportExtension;
  /** Names the generated file declares itself */
  reserved: ReadonlySet<string>;
}

interface ImportBinding {
  readonly specifier: string;
  readonly imported: string;
  readonly local: string;
}

function bindingName(ref: NamedRef): string {
  return ref.name.split(".")[0];
}

/**
 * Import list of one generated file. Every named type is registered up front
 * so that `_2` aliases depend only on the set of types, not on the order they
 * are rendered in.
 */
export class ImportContext {
  private readonly bindings = new Map<string, ImportBinding>();
  private readonly taken = new Set<string>();

  constructor(private readonly options: ImportContextOptions) {}

  /**
   * Register the types a file references. `first` is bound before the
   * others so the mocked interface keeps its own name.
   */
  register(refs: readonly NamedRef[], first?: NamedRef): void {
    const own = refs.filter((ref) => ref.packagePath !== "" && this.isSelf(ref));
    for (const ref of own) {
      const name = bindingName(ref);
      this.checkReserved(name, "this module");
      this.taken.add(name);
    }

    const imported = refs
      .filter((ref) => ref.packagePath !== "" && !this.isSelf(ref))
      .map((ref) => ({ specifier: this.specifierFor(ref.packagePath), imported: bindingName(ref) }))
      .sort((a, b) => compare(`${a.specifier}\0${a.imported}`, `${b.specifier}\0${b.imported}`));
    if (first && first.packagePath !== "" && !this.isSelf(first)) {
      imported.unshift({ specifier: this.specifierFor(first.packagePath), imported: bindingName(first) });
    }

    for (const { specifier, imported: name } of imported) {
      const key = `${specifier}\0${name}`;
      if (this.bindings.has(key)) continue;
      this.checkReserved(name, `"${specifier}"`);

      let local = name;
      for (let n = 2; this.taken.has(local); n++) local = `${name}_${n}`;
      this.taken.add(local);
      this.bindings.set(key, { specifier, imported: name, local });
    }
  }

  /** Name to write for a named type, qualified by its local binding. */
  reference(ref: NamedRef): string {
    if (ref.packagePath === "" || this.isSelf(ref)) return ref.name;
    const [head, ...rest] = ref.name.split(".");
    const binding = this.bindings.get(`${this.specifierFor(ref.packagePath)}\0${head}`);
    if (!binding) {
      throw new GenerationError(`Type ${ref.name} from "${ref.packagePath}" was not registered for import`, ref.name);
    }
    return [binding.local, ...rest].join(".");
  }

  /** Module specifier of a package path as seen from the generated file. */
  specifierFor(packagePath: string): string {
    if (packagePath.startsWith(".")) {
      throw new GenerationError(`Cannot render an import of relative module path "${packagePath}"`, packagePath);
    }
    if (!isAbsolute(packagePath)) return packagePath;

    let path = relative(this.options.fromDir, packagePath).split(sep).join("/");
    if (!path.startsWith(".")) path = `./${path}`;
    return `${path}${this.options.importExtension}`;
  }

  /** `import type` lines, sorted by specifier, names sorted within each. */
  lines(): string[] {
    const bySpecifier = new Map<string, ImportBinding[]>();
    for (const binding of this.bindings.values()) {
      const group = bySpecifier.get(binding.specifier) ?? [];
      group.push(binding);
      bySpecifier.set(binding.specifier, group);
    }

    return [...bySpecifier.keys()].sort(compare).map((specifier) => {
      const names = (bySpecifier.get(specifier) ?? [])
        .sort((a, b) => compare(a.imported, b.imported))
        .map((b) => (b.imported === b.local ? b.imported : `${b.imported} as ${b.local}`));
      return `import type { ${names.join(", ")} } from "${specifier}";`;
    });
  }

  private isSelf(ref: NamedRef): boolean {
    return this.options.selfPackagePath !== undefined && ref.packagePath === this.options.selfPackagePath;
  }

  private checkReserved(name: string, from: string): void {
    if (this.options.reserved.has(name)) {
      throw new GenerationError(`Type ${name} from ${from} collides with a name declared by the generated file`, name);
    }
  }
}

export function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
