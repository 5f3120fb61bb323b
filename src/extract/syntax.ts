import { Node, SyntaxKind, type TypeAliasDeclaration, type TypeNode, type TypeReferenceNode } from "ts-morph";

const ALIASED_KINDS = new Set([
  SyntaxKind.UnionType,
  SyntaxKind.IntersectionType,
  SyntaxKind.TypeLiteral,
  SyntaxKind.FunctionType,
  SyntaxKind.ConstructorType,
  SyntaxKind.MappedType,
  SyntaxKind.ConditionalType,
  SyntaxKind.IndexedAccessType,
  SyntaxKind.TemplateLiteralType,
  SyntaxKind.TypeQuery,
]);

/** Type syntax neither backend turns into a model. */
const UNSUPPORTED_KINDS = new Set([
  SyntaxKind.MappedType,
  SyntaxKind.ConditionalType,
  SyntaxKind.IndexedAccessType,
  SyntaxKind.TemplateLiteralType,
  SyntaxKind.TypeQuery,
  SyntaxKind.ThisType,
  SyntaxKind.ConstructorType,
  SyntaxKind.TypePredicate,
  SyntaxKind.ImportType,
  SyntaxKind.OptionalType,
  SyntaxKind.RestType,
]);

/** The type alias a reference names, looking through imports. */
export function aliasDeclarationOf(node: TypeReferenceNode): TypeAliasDeclaration | undefined {
  const typeName = node.getTypeName();
  const symbol = (Node.isQualifiedName(typeName) ? typeName.getRight() : typeName).getSymbol();
  const target = symbol?.isAlias() ? symbol.getAliasedSymbol() : symbol;
  const declaration = target?.getDeclarations()[0];
  return Node.isTypeAliasDeclaration(declaration) ? declaration : undefined;
}

/**
 * Whether the checker keeps an alias name for this alias body. Aliases of
 * primitives, literals, arrays and interfaces are erased; a generic alias
 * instantiated in the body keeps the outer name if its own body would.
 */
export function keepsAlias(body: TypeNode): boolean {
  let node = body;
  while (Node.isParenthesizedTypeNode(node)) node = node.getTypeNode();
  if (ALIASED_KINDS.has(node.getKind())) return true;
  if (!Node.isTypeReference(node) || node.getTypeArguments().length === 0) return false;

  const inner = aliasDeclarationOf(node)?.getTypeNode();
  return inner !== undefined && keepsAlias(inner);
}

function isUnsupported(node: Node): boolean {
  if (UNSUPPORTED_KINDS.has(node.getKind())) return true;
  if (Node.isTypeOperatorTypeNode(node)) return node.getOperator() !== SyntaxKind.ReadonlyKeyword;
  if (Node.isNamedTupleMember(node)) {
    return node.compilerNode.questionToken !== undefined || node.compilerNode.dotDotDotToken !== undefined;
  }
  return false;
}

/**
 * First type node under `root` that has no model, in source order. Aliases
 * whose names are erased are followed into their bodies; kept aliases stay
 * opaque named types.
 */
export function findUnsupportedSyntax(root: Node, visited = new Set<TypeAliasDeclaration>()): Node | undefined {
  let found: Node | undefined;
  root.forEachDescendant((node, traversal) => {
    if (isUnsupported(node)) {
      found = node;
      traversal.stop();
      return;
    }
    if (!Node.isTypeReference(node)) return;
    const declaration = aliasDeclarationOf(node);
    const body = declaration?.getTypeNode();
    if (!declaration || !body || visited.has(declaration) || keepsAlias(body)) return;
    visited.add(declaration);
    const inner = isUnsupported(body) ? body : findUnsupportedSyntax(body, visited);
    if (inner) {
      found = inner;
      traversal.stop();
    }
  });
  return found;
}
