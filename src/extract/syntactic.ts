import { existsSync } from "node:fs";
import { resolve } from "node:path";
import {
  Node,
  SyntaxKind,
  type CallSignatureDeclaration,
  type EntityName,
  type FunctionTypeNode,
  type InterfaceDeclaration,
  type LiteralTypeNode,
  type MethodSignature as MethodSignatureNode,
  type ParameterDeclaration,
  type Program,
  type Project,
  type TupleTypeNode,
  type TypeAliasDeclaration,
  type TypeElementTypes,
  type TypeLiteralNode,
  type TypeNode,
  type TypeParameterDeclaration,
  type TypeReferenceNode,
} from "ts-morph";
import { ExtractionError } from "../core/errors.js";
import {
  intersection,
  literal,
  named,
  primitive,
  substitute,
  substituteSignature,
  union,
  withoutUndefined,
} from "../model/type-ref.js";
import type {
  FunctionRef,
  InterfaceModel,
  MethodSignature,
  Parameter,
  PropertySignature,
  TypeParameter,
  TypeRef,
} from "../model/types.js";
import { KEYWORD_PRIMITIVES, declaredRef, originOf, splitResults } from "./origin.js";
import {
  createProject,
  findExportedInterface,
  loadSourceFile,
  projectSourceFiles,
  resolveModule,
  type MockableDeclaration,
} from "./project.js";
import { keepsAlias } from "./syntax.js";
import type { ModelBuilder, SourceSpec } from "./types.js";

type SignatureNode = FunctionTypeNode | CallSignatureDeclaration | MethodSignatureNode;
type Signature = Pick<FunctionRef, "typeParameters" | "params" | "results">;

function unsupported(node: Node, owner: string): ExtractionError {
  return new ExtractionError(`Unsupported type \`${node.getText()}\` in ${owner}`, owner);
}

/** Name of a member written as an identifier, string or numeric literal. */
export function memberNameOf(member: TypeElementTypes, owner: string): string {
  if (!Node.isPropertySignature(member) && !Node.isMethodSignature(member)) {
    throw new ExtractionError(`Unsupported member \`${member.getText()}\` in ${owner}`, owner);
  }
  const nameNode = member.getNameNode();
  if (Node.isIdentifier(nameNode)) return nameNode.getText();
  if (Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)) return nameNode.getLiteralValue();
  if (Node.isNumericLiteral(nameNode)) return String(nameNode.getLiteralValue());
  throw new ExtractionError(`Unsupported member name \`${nameNode.getText()}\` in ${owner}`, owner);
}

function bigintText(text: string): string {
  return `${BigInt(text.replace(/n$/, "")).toString()}n`;
}

/** Converts type nodes as written, keeping declared parameter names. */
class TypeNodeConverter {
  private readonly expanding = new Set<TypeAliasDeclaration>();

  constructor(
    private readonly program: Program,
    readonly owner: string,
  ) {}

  convert(node: TypeNode): TypeRef {
    const keyword = KEYWORD_PRIMITIVES.get(node.getKind());
    if (keyword) return keyword;

    if (Node.isParenthesizedTypeNode(node)) return this.convert(node.getTypeNode());
    if (Node.isLiteralTypeNode(node)) return this.literal(node);
    if (Node.isArrayTypeNode(node)) {
      return { kind: "array", element: this.convert(node.getElementTypeNode()), readonly: false };
    }
    if (Node.isTupleTypeNode(node)) return this.tuple(node, false);
    if (Node.isTypeOperatorTypeNode(node) && node.getOperator() === SyntaxKind.ReadonlyKeyword) {
      const inner = node.getTypeNode();
      if (Node.isArrayTypeNode(inner)) {
        return { kind: "array", element: this.convert(inner.getElementTypeNode()), readonly: true };
      }
      if (Node.isTupleTypeNode(inner)) return this.tuple(inner, true);
    }
    if (Node.isUnionTypeNode(node)) return union(node.getTypeNodes().map((n) => this.convert(n)));
    if (Node.isIntersectionTypeNode(node)) return intersection(node.getTypeNodes().map((n) => this.convert(n)));
    if (Node.isFunctionTypeNode(node)) return { kind: "function", ...this.signature(node) };
    if (Node.isTypeLiteral(node)) return this.typeLiteral(node);
    if (Node.isTypeReference(node)) return this.reference(node);

    throw unsupported(node, this.owner);
  }

  signature(node: SignatureNode): Signature {
    const returnType = node.getReturnTypeNode();
    return {
      typeParameters: node.getTypeParameters().map((tp) => this.typeParameter(tp)),
      params: node.getParameters().map((p, i) => this.parameter(p, i)),
      results: splitResults(returnType ? this.convert(returnType) : primitive("any")),
    };
  }

  typeParameter(tp: TypeParameterDeclaration): TypeParameter {
    const constraint = tp.getConstraint();
    const fallback = tp.getDefault();
    return {
      name: tp.getName(),
      ...(constraint ? { constraint: this.convert(constraint) } : {}),
      ...(fallback ? { default: this.convert(fallback) } : {}),
    };
  }

  private parameter(param: ParameterDeclaration, index: number): Parameter {
    const nameNode = param.getNameNode();
    if (Node.isIdentifier(nameNode) && nameNode.getText() === "this") {
      throw new ExtractionError(`\`this\` parameters are not supported in ${this.owner}`, this.owner);
    }
    const typeNode = param.getTypeNode();
    const type = typeNode ? this.convert(typeNode) : primitive("any");
    const optional = param.hasQuestionToken() || param.hasInitializer();
    return {
      name: Node.isIdentifier(nameNode) ? nameNode.getText() : `arg${index}`,
      type: optional ? withoutUndefined(type) : type,
      optional,
      variadic: param.isRestParameter(),
    };
  }

  private literal(node: LiteralTypeNode): TypeRef {
    const value = node.getLiteral();
    if (value.getKind() === SyntaxKind.NullKeyword) return primitive("null");
    if (value.getKind() === SyntaxKind.TrueKeyword) return literal("true");
    if (value.getKind() === SyntaxKind.FalseKeyword) return literal("false");
    if (Node.isStringLiteral(value) || Node.isNoSubstitutionTemplateLiteral(value)) {
      return literal(JSON.stringify(value.getLiteralValue()));
    }
    if (Node.isNumericLiteral(value)) return literal(String(value.getLiteralValue()));
    if (value.getKind() === SyntaxKind.BigIntLiteral) return literal(bigintText(value.getText()));
    if (Node.isPrefixUnaryExpression(value) && value.getOperatorToken() === SyntaxKind.MinusToken) {
      const operand = value.getOperand();
      if (Node.isNumericLiteral(operand)) return literal(String(-operand.getLiteralValue()));
      if (operand.getKind() === SyntaxKind.BigIntLiteral) return literal(`-${bigintText(operand.getText())}`);
    }
    throw unsupported(node, this.owner);
  }

  private tuple(node: TupleTypeNode, readonly: boolean): TypeRef {
    const elements = node.getElements().map((element) => {
      if (Node.isNamedTupleMember(element)) {
        if (element.compilerNode.questionToken || element.compilerNode.dotDotDotToken) {
          throw unsupported(element, this.owner);
        }
        return this.convert(element.getTypeNode());
      }
      if (element.getKind() === SyntaxKind.OptionalType || element.getKind() === SyntaxKind.RestType) {
        throw unsupported(element, this.owner);
      }
      return this.convert(element);
    });
    return { kind: "tuple", elements, readonly };
  }

  private typeLiteral(node: TypeLiteralNode): TypeRef {
    const members = node.getMembers();
    const only = members[0];
    if (members.length === 1 && Node.isCallSignatureDeclaration(only)) {
      return { kind: "function", ...this.signature(only) };
    }
    return { kind: "object", members: members.map((m) => this.objectMember(m)) };
  }

  private objectMember(member: TypeElementTypes): PropertySignature {
    const name = memberNameOf(member, this.owner);
    if (Node.isMethodSignature(member)) {
      return {
        name,
        type: { kind: "function", ...this.signature(member) },
        optional: member.hasQuestionToken(),
        readonly: false,
      };
    }
    if (!Node.isPropertySignature(member)) throw unsupported(member, this.owner);
    const typeNode = member.getTypeNode();
    const type = typeNode ? this.convert(typeNode) : primitive("any");
    const optional = member.hasQuestionToken();
    return { name, type: optional ? withoutUndefined(type) : type, optional, readonly: member.isReadonly() };
  }

  private reference(node: TypeReferenceNode): TypeRef {
    const typeName = node.getTypeName();
    const args = node.getTypeArguments().map((a) => this.convert(a));
    const identifier = Node.isQualifiedName(typeName) ? typeName.getRight() : typeName;
    const symbol = identifier.getSymbol();
    const target = symbol?.isAlias() ? symbol.getAliasedSymbol() : symbol;
    const declaration = target?.getDeclarations()[0];

    if (!target || !declaration) return this.unresolvedImport(typeName, args);
    if (Node.isTypeParameterDeclaration(declaration)) return { kind: "typeParameter", name: target.getName() };
    if (Node.isTypeAliasDeclaration(declaration) && !this.expanding.has(declaration)) {
      const body = declaration.getTypeNode();
      if (body && !keepsAlias(body)) return this.expandAlias(declaration, body, args);
    }
    return declaredRef(originOf(target, this.program, this.owner), args);
  }

  private expandAlias(declaration: TypeAliasDeclaration, body: TypeNode, args: TypeRef[]): TypeRef {
    const bindings = new Map<string, TypeRef>();
    declaration.getTypeParameters().forEach((tp, i) => {
      const fallback = tp.getDefault();
      bindings.set(tp.getName(), args[i] ?? (fallback ? this.convert(fallback) : primitive("unknown")));
    });
    this.expanding.add(declaration);
    try {
      return substitute(this.convert(body), bindings);
    } finally {
      this.expanding.delete(declaration);
    }
  }

  /**
   * A type imported from a module the compiler cannot find. Package imports
   * are taken on trust; relative imports must resolve.
   */
  private unresolvedImport(typeName: EntityName, args: TypeRef[]): TypeRef {
    const text = typeName.getText();
    let leftmost = typeName;
    while (Node.isQualifiedName(leftmost)) leftmost = leftmost.getLeft();

    const importNode = leftmost.getSymbol()?.getDeclarations()[0];
    const importDeclaration = importNode?.getFirstAncestorByKind(SyntaxKind.ImportDeclaration);
    if (!importNode || !importDeclaration) {
      throw new ExtractionError(`Cannot resolve type ${text} used by ${this.owner}`, this.owner);
    }

    const specifier = importDeclaration.getModuleSpecifierValue();
    if (specifier.startsWith(".") || specifier.startsWith("/")) {
      const message = importDeclaration.getModuleSpecifierSourceFile()
        ? `Module "${specifier}" does not export ${text} (used by ${this.owner})`
        : `Cannot resolve import "${specifier}" for type ${text} used by ${this.owner}`;
      throw new ExtractionError(message, this.owner);
    }

    const rest = text.split(".").slice(1).map((part) => part.trim());
    if (Node.isImportSpecifier(importNode)) {
      return named([importNode.getName(), ...rest].join("."), specifier, args);
    }
    if (Node.isNamespaceImport(importNode) && rest.length > 0) {
      return named(rest.join("."), specifier, args);
    }
    throw new ExtractionError(`Cannot import type ${text} from "${specifier}" by name (used by ${this.owner})`, this.owner);
  }
}

interface Collected {
  readonly methods: MethodSignature[];
  readonly properties: PropertySignature[];
  readonly claimed: Map<string, { node: Node; owner: string }>;
}

/**
 * Builds models by walking the declarations as written. Parameter names are
 * kept; base interfaces are flattened with their type arguments applied.
 */
export class SyntacticModelBuilder implements ModelBuilder {
  readonly backend = "syntactic";
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
    const declaration = spec.kind === "file" ? this.fromFile(spec.filePath, spec.interfaceName) : this.fromPackage(spec.packagePath, spec.interfaceNames);
    return [this.buildModel(declaration)];
  }

  private fromFile(filePath: string, interfaceName: string | undefined): MockableDeclaration {
    const absolute = resolve(this.cwd, filePath);
    if (!existsSync(absolute)) {
      throw new ExtractionError(`Source file not found: ${filePath}`, filePath);
    }
    const sourceFile = loadSourceFile(this.project, absolute);
    if (interfaceName) return findExportedInterface(sourceFile, interfaceName, filePath);

    const candidates = sourceFile.getInterfaces().filter((i) => i.isExported());
    if (candidates.length === 0) {
      throw new ExtractionError(`No exported interface found in ${filePath}`, filePath);
    }
    if (candidates.length > 1) {
      const names = candidates.map((c) => c.getName()).join(", ");
      throw new ExtractionError(
        `${filePath} exports ${candidates.length} interfaces (${names}); name the one to mock`,
        filePath,
      );
    }
    return candidates[0];
  }

  private fromPackage(packagePath: string, interfaceNames: readonly string[]): MockableDeclaration {
    if (interfaceNames.length !== 1) {
      throw new ExtractionError(
        `The syntactic backend mocks one interface per run, got ${interfaceNames.length}`,
        packagePath,
      );
    }
    const file = resolveModule(this.project, packagePath, this.cwd);
    if (!file) {
      throw new ExtractionError(`Cannot resolve module "${packagePath}" from ${this.cwd}`, packagePath);
    }
    return findExportedInterface(loadSourceFile(this.project, file), interfaceNames[0], `"${packagePath}"`);
  }

  private buildModel(declaration: MockableDeclaration): InterfaceModel {
    const program = this.project.getProgram();
    const origin = originOf(declaration.getSymbolOrThrow(), program, declaration.getName());
    const converter = new TypeNodeConverter(program, origin.name);
    const collected: Collected = { methods: [], properties: [], claimed: new Map() };

    this.collect(declaration, new Map(), collected);

    return {
      interfaceName: origin.name,
      sourcePackage: origin.packagePath,
      typeParameters: declaration.getTypeParameters().map((tp) => converter.typeParameter(tp)),
      methods: collected.methods,
      properties: collected.properties,
    };
  }

  /** Own members first, then each base in `extends` order, depth-first. */
  private collect(declaration: MockableDeclaration, bindings: ReadonlyMap<string, TypeRef>, into: Collected): void {
    const program = this.project.getProgram();
    const owner = declaration.getName();
    const converter = new TypeNodeConverter(program, owner);
    const interfaces = Node.isInterfaceDeclaration(declaration)
      ? (declaration.getSymbol()?.getDeclarations() ?? [declaration]).filter(
          (d): d is InterfaceDeclaration => Node.isInterfaceDeclaration(d),
        )
      : [];

    const members: TypeElementTypes[] = interfaces.flatMap((d) => d.getMembers());
    const typeNode = Node.isTypeAliasDeclaration(declaration) ? declaration.getTypeNode() : undefined;
    if (Node.isTypeLiteral(typeNode)) members.push(...typeNode.getMembers());

    for (const member of members) {
      const name = memberNameOf(member, owner);
      const previous = into.claimed.get(name);
      if (previous) {
        if (previous.node === member) continue;
        if (previous.owner === owner) {
          throw new ExtractionError(`${owner}.${name} is overloaded; overloaded methods cannot be mocked`, `${owner}.${name}`);
        }
        throw new ExtractionError(`Member ${name} is declared by both ${previous.owner} and ${owner}`, `${owner}.${name}`);
      }
      into.claimed.set(name, { node: member, owner });

      if (Node.isMethodSignature(member)) {
        const method: MethodSignature = { name, ...converter.signature(member) };
        into.methods.push(substituteSignature(method, bindings));
      } else if (Node.isPropertySignature(member)) {
        const propertyType = member.getTypeNode();
        const optional = member.hasQuestionToken();
        const type = substitute(propertyType ? converter.convert(propertyType) : primitive("any"), bindings);
        into.properties.push({ name, type: optional ? withoutUndefined(type) : type, optional, readonly: member.isReadonly() });
      }
    }

    for (const d of interfaces) {
      for (const heritage of d.getExtends()) {
        const base = this.resolveBase(heritage.getExpression(), owner);
        const args = heritage.getTypeArguments().map((a) => substitute(converter.convert(a), bindings));
        const baseConverter = new TypeNodeConverter(program, base.getName());
        const baseBindings = new Map<string, TypeRef>();
        base.getTypeParameters().forEach((tp, i) => {
          const fallback = tp.getDefault();
          const bound = args[i] ?? (fallback ? substitute(baseConverter.convert(fallback), baseBindings) : primitive("unknown"));
          baseBindings.set(tp.getName(), bound);
        });
        this.collect(base, baseBindings, into);
      }
    }
  }

  private resolveBase(expression: Node, owner: string): MockableDeclaration {
    const symbol = expression.getSymbol();
    const target = symbol?.isAlias() ? symbol.getAliasedSymbol() : symbol;
    const base = target
      ?.getDeclarations()
      .find((d): d is MockableDeclaration => Node.isInterfaceDeclaration(d) || Node.isTypeAliasDeclaration(d));
    if (!base) {
      throw new ExtractionError(`Cannot resolve base interface ${expression.getText()} of ${owner}`, owner);
    }
    if (Node.isTypeAliasDeclaration(base) && !Node.isTypeLiteral(base.getTypeNode())) {
      throw new ExtractionError(`Base ${expression.getText()} of ${owner} is not an object type`, owner);
    }
    return base;
  }
}
