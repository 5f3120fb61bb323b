import {
  Node,
  ts,
  type EnumDeclaration,
  type Program,
  type Project,
  type Signature as MorphSignature,
  type Symbol as MorphSymbol,
  type Type,
} from "ts-morph";
import { ExtractionError } from "../core/errors.js";
import { intersection, literal, primitive, union, withoutUndefined } from "../model/type-ref.js";
import type {
  FunctionRef,
  InterfaceModel,
  MethodSignature,
  Parameter,
  PrimitiveName,
  PropertySignature,
  TypeParameter,
  TypeRef,
} from "../model/types.js";
import { declaredRef, originOf, splitResults } from "./origin.js";
import {
  createProject,
  findExportedInterface,
  loadSourceFile,
  projectSourceFiles,
  resolveModule,
  type MockableDeclaration,
} from "./project.js";
import { findUnsupportedSyntax } from "./syntax.js";
import type { ModelBuilder, SourceSpec } from "./types.js";

type Signature = Pick<FunctionRef, "typeParameters" | "params" | "results">;

const FLAG_PRIMITIVES: [ts.TypeFlags, PrimitiveName][] = [
  [ts.TypeFlags.Any, "any"],
  [ts.TypeFlags.Unknown, "unknown"],
  [ts.TypeFlags.Never, "never"],
  [ts.TypeFlags.Void, "void"],
  [ts.TypeFlags.Undefined, "undefined"],
  [ts.TypeFlags.Null, "null"],
  [ts.TypeFlags.String, "string"],
  [ts.TypeFlags.Number, "number"],
  [ts.TypeFlags.BigInt, "bigint"],
  [ts.TypeFlags.ESSymbol, "symbol"],
  [ts.TypeFlags.NonPrimitive, "object"],
  [ts.TypeFlags.Boolean, "boolean"],
];

/**
 * Reject the written type syntax the syntactic backend rejects, so both
 * backends accept the same interfaces.
 */
function checkSyntax(declaration: MockableDeclaration, symbols: MorphSymbol[], owner: string): void {
  const roots = [declaration, ...symbols.map((s) => s.getDeclarations()[0])];
  for (const root of roots) {
    if (!root || (root !== declaration && root.getAncestors().includes(declaration))) continue;
    const node = findUnsupportedSyntax(root);
    if (node) throw new ExtractionError(`Unsupported type \`${node.getText()}\` in ${owner}`, owner);
  }
}

function memberName(symbol: MorphSymbol, owner: string): string {
  const name = symbol.getName();
  const declaration = symbol.getDeclarations()[0];
  const computed =
    (Node.isPropertySignature(declaration) || Node.isMethodSignature(declaration)) &&
    Node.isComputedPropertyName(declaration.getNameNode());
  if (computed || name.startsWith("__@")) {
    throw new ExtractionError(`Unsupported member name \`${name}\` in ${owner}`, owner);
  }
  return name;
}

function isReadonly(symbol: MorphSymbol): boolean {
  const declaration = symbol.getDeclarations()[0];
  return Node.isPropertySignature(declaration) && declaration.isReadonly();
}

function declaringName(node: Node): string {
  const container = node.getParent();
  if (Node.isInterfaceDeclaration(container)) return container.getName();
  const alias = container?.getParent();
  return Node.isTypeAliasDeclaration(alias) ? alias.getName() : "<anonymous>";
}

function enumOf(type: Type): EnumDeclaration | undefined {
  const declaration = type.getSymbol()?.getDeclarations()[0];
  if (!Node.isEnumMember(declaration)) return undefined;
  return declaration.getParent();
}

/** Converts checker types; parameter names are not kept. */
class TypeConverter {
  constructor(
    private readonly program: Program,
    private readonly owner: string,
    private readonly location: Node,
  ) {}

  convert(type: Type): TypeRef {
    const flags = type.getFlags();

    if (flags & ts.TypeFlags.TypeParameter) {
      const name = type.getText();
      if (name === "this") throw this.unsupported(type);
      return { kind: "typeParameter", name: type.getSymbol()?.getName() ?? name };
    }

    const alias = type.getAliasSymbol();
    if (alias) {
      const args = type.getAliasTypeArguments().map((t) => this.convert(t));
      return declaredRef(originOf(alias, this.program, this.owner), args);
    }

    for (const [flag, name] of FLAG_PRIMITIVES) {
      if (flags & flag) return primitive(name);
    }

    const symbol = type.getSymbol();
    if (symbol && symbol.getFlags() & (ts.SymbolFlags.Enum | ts.SymbolFlags.EnumMember)) {
      return declaredRef(originOf(symbol, this.program, this.owner), []);
    }

    if (flags & ts.TypeFlags.BooleanLiteral) return literal(type.getText());
    if (flags & (ts.TypeFlags.StringLiteral | ts.TypeFlags.NumberLiteral | ts.TypeFlags.BigIntLiteral)) {
      const value = type.getLiteralValue();
      if (typeof value === "string") return literal(JSON.stringify(value));
      if (typeof value === "number") return literal(String(value));
      if (value !== undefined) return literal(`${value.negative ? "-" : ""}${value.base10Value}n`);
    }

    if (type.isUnion()) return this.union(type.getUnionTypes());
    if (type.isIntersection()) return intersection(type.getIntersectionTypes().map((t) => this.convert(t)));
    if (type.isTuple()) {
      return {
        kind: "tuple",
        elements: type.getTupleElements().map((t) => this.convert(t)),
        readonly: type.getText().startsWith("readonly "),
      };
    }
    if (flags & ts.TypeFlags.Object) return this.object(type);

    throw this.unsupported(type);
  }

  signature(sig: MorphSignature): Signature {
    return {
      typeParameters: sig.getTypeParameters().map((tp) => this.typeParameter(tp)),
      params: sig.getParameters().map((p, i) => this.parameter(p, i)),
      results: splitResults(this.convert(sig.getReturnType())),
    };
  }

  typeParameter(tp: Type): TypeParameter {
    const constraint = tp.getConstraint();
    const fallback = tp.getDefault();
    return {
      name: tp.getSymbol()?.getName() ?? tp.getText(),
      ...(constraint ? { constraint: this.convert(constraint) } : {}),
      ...(fallback ? { default: this.convert(fallback) } : {}),
    };
  }

  private parameter(symbol: MorphSymbol, index: number): Parameter {
    const declaration = symbol.getDeclarations()[0];
    const param = Node.isParameterDeclaration(declaration) ? declaration : undefined;
    const optional = param ? param.hasQuestionToken() || param.hasInitializer() : false;
    const type = this.convert(symbol.getTypeAtLocation(this.location));
    return {
      name: `p${index}`,
      type: optional ? withoutUndefined(type) : type,
      optional,
      variadic: param?.isRestParameter() ?? false,
    };
  }

  /** The checker spreads enums into their members inside unions; fold complete enums back. */
  private union(types: Type[]): TypeRef {
    const seen = new Map<EnumDeclaration, number>();
    for (const t of types) {
      const owner = enumOf(t);
      if (owner) seen.set(owner, (seen.get(owner) ?? 0) + 1);
    }

    const folded = new Set<EnumDeclaration>();
    const members: TypeRef[] = [];
    for (const t of types) {
      const owner = enumOf(t);
      if (owner && seen.get(owner) === owner.getMembers().length) {
        if (folded.has(owner)) continue;
        folded.add(owner);
        members.push(declaredRef(originOf(owner.getSymbolOrThrow(), this.program, this.owner), []));
      } else {
        members.push(this.convert(t));
      }
    }
    return union(members);
  }

  private object(type: Type): TypeRef {
    const symbol = type.getSymbol();
    if (symbol && symbol.getFlags() & (ts.SymbolFlags.Interface | ts.SymbolFlags.Class)) {
      const declaration = symbol.getDeclarations()[0];
      const arity =
        Node.isInterfaceDeclaration(declaration) || Node.isClassDeclaration(declaration)
          ? declaration.getTypeParameters().length
          : 0;
      const args = type.getTypeArguments().slice(0, arity).map((t) => this.convert(t));
      return declaredRef(originOf(symbol, this.program, this.owner), args);
    }

    if (type.getConstructSignatures().length > 0 || type.getStringIndexType() || type.getNumberIndexType()) {
      throw this.unsupported(type);
    }
    const calls = type.getCallSignatures();
    const properties = type.getProperties();
    if (calls.length === 1 && properties.length === 0) return { kind: "function", ...this.signature(calls[0]) };
    if (calls.length > 0) throw this.unsupported(type);

    return { kind: "object", members: properties.map((p) => this.objectMember(p)) };
  }

  private objectMember(symbol: MorphSymbol): PropertySignature {
    const optional = (symbol.getFlags() & ts.SymbolFlags.Optional) !== 0;
    const type = this.convert(symbol.getTypeAtLocation(this.location));
    return {
      name: memberName(symbol, this.owner),
      type: optional ? withoutUndefined(type) : type,
      optional,
      readonly: isReadonly(symbol),
    };
  }

  private unsupported(type: Type): ExtractionError {
    return new ExtractionError(`Unsupported type \`${type.getText()}\` in ${this.owner}`, this.owner);
  }
}

/** Same member name reached through two different declarations. */
function checkCollisions(root: Type, owner: string): void {
  const claimed = new Map<string, Node>();
  const visited = new Set<ts.Type>();

  const visit = (type: Type): void => {
    const target = type.getTargetType() ?? type;
    if (visited.has(target.compilerType)) return;
    visited.add(target.compilerType);

    for (const property of target.getProperties()) {
      const declaration = property.getDeclarations()[0];
      if (!declaration) continue;
      const previous = claimed.get(property.getName());
      if (!previous) {
        claimed.set(property.getName(), declaration);
      } else if (previous !== declaration && declaringName(previous) !== declaringName(declaration)) {
        throw new ExtractionError(
          `Member ${property.getName()} is declared by both ${declaringName(previous)} and ${declaringName(declaration)}`,
          `${owner}.${property.getName()}`,
        );
      }
    }
    if (target.isInterface()) target.getBaseTypes().forEach(visit);
  };
  visit(root);
}

/**
 * Builds models from the type checker's view of a module. Several
 * interfaces can be requested at once; parameter names come out as
 * `p0`, `p1`, ...
 */
export class ReflectiveModelBuilder implements ModelBuilder {
  readonly backend = "reflective";
  private readonly project: Project;

  constructor(
    private readonly cwd: string,
    project?: Project,
  ) {
    this.project = project ?? createProject(cwd);
  }

  sourceFiles(): string[] {
    return projectSourceFiles(this.project);
  }

  extract(spec: SourceSpec): InterfaceModel[] {
    if (spec.kind === "file") {
      throw new ExtractionError(
        `The reflective backend reads modules, not single files; use the syntactic backend for ${spec.filePath}`,
        spec.filePath,
      );
    }
    const names = [...new Set(spec.interfaceNames)];
    if (names.length === 0) {
      throw new ExtractionError(`No interface names given for "${spec.packagePath}"`, spec.packagePath);
    }
    const file = resolveModule(this.project, spec.packagePath, this.cwd);
    if (!file) {
      throw new ExtractionError(`Cannot resolve module "${spec.packagePath}" from ${this.cwd}`, spec.packagePath);
    }
    const sourceFile = loadSourceFile(this.project, file);
    return names.map((name) => this.buildModel(findExportedInterface(sourceFile, name, `"${spec.packagePath}"`)));
  }

  private buildModel(declaration: MockableDeclaration): InterfaceModel {
    const program = this.project.getProgram();
    const origin = originOf(declaration.getSymbolOrThrow(), program, declaration.getName());
    const owner = origin.name;
    const converter = new TypeConverter(program, owner, declaration);
    const type = declaration.getType();

    if (
      type.getCallSignatures().length > 0 ||
      type.getConstructSignatures().length > 0 ||
      type.getStringIndexType() ||
      type.getNumberIndexType()
    ) {
      throw new ExtractionError(`${owner} has call, construct or index signatures, which cannot be mocked`, owner);
    }
    checkCollisions(type, owner);
    checkSyntax(declaration, type.getProperties(), owner);

    let symbols = type.getProperties();
    if (symbols.some((s) => s.getDeclarations().length === 0)) {
      symbols = [...symbols].sort((a, b) => (a.getName() < b.getName() ? -1 : a.getName() > b.getName() ? 1 : 0));
    }

    const methods: MethodSignature[] = [];
    const properties: PropertySignature[] = [];
    for (const symbol of symbols) {
      const name = memberName(symbol, owner);
      const flags = symbol.getFlags();
      const memberType = symbol.getTypeAtLocation(declaration);

      if (flags & ts.SymbolFlags.Method) {
        const signatures = memberType.getNonNullableType().getCallSignatures();
        if (signatures.length !== 1) {
          throw new ExtractionError(`${owner}.${name} is overloaded; overloaded methods cannot be mocked`, `${owner}.${name}`);
        }
        methods.push({ name, ...converter.signature(signatures[0]) });
      } else if (flags & ts.SymbolFlags.Property) {
        const optional = (flags & ts.SymbolFlags.Optional) !== 0;
        const propertyType = converter.convert(memberType);
        properties.push({
          name,
          type: optional ? withoutUndefined(propertyType) : propertyType,
          optional,
          readonly: isReadonly(symbol),
        });
      } else {
        throw new ExtractionError(`Unsupported member ${name} in ${owner}`, `${owner}.${name}`);
      }
    }

    return {
      interfaceName: origin.name,
      sourcePackage: origin.packagePath,
      typeParameters: declaration.getTypeParameters().map((tp) => converter.typeParameter(tp.getType())),
      methods,
      properties,
    };
  }
}
