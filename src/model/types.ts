export type PrimitiveName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "undefined"
  | "null"
  | "void"
  | "unknown"
  | "any"
  | "never"
  | "object";

export interface PrimitiveRef {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
}

export interface LiteralRef {
  readonly kind: "literal";
  /** Source text of the literal, e.g. `"on"`, `42`, `true`, `10n` */
  readonly text: string;
}

export interface NamedRef {
  readonly kind: "named";
  /** Name as referenced from the declaring module; dotted for namespace members */
  readonly name: string;
  /** Absolute module path without extension, a package name, or "" for globals */
  readonly packagePath: string;
  readonly typeArgs: readonly TypeRef[];
}

export interface TypeParameterRef {
  readonly kind: "typeParameter";
  readonly name: string;
}

export interface ArrayRef {
  readonly kind: "array";
  readonly element: TypeRef;
  readonly readonly: boolean;
}

export interface TupleRef {
  readonly kind: "tuple";
  readonly elements: readonly TypeRef[];
  readonly readonly: boolean;
}

export type MapStyle = "Map" | "ReadonlyMap" | "Record";

export interface MapRef {
  readonly kind: "map";
  readonly key: TypeRef;
  readonly value: TypeRef;
  readonly style: MapStyle;
}

export interface SetRef {
  readonly kind: "set";
  readonly element: TypeRef;
  readonly readonly: boolean;
}

export interface PromiseRef {
  readonly kind: "promise";
  readonly inner: TypeRef;
}

export interface AsyncIterableRef {
  readonly kind: "asyncIterable";
  readonly element: TypeRef;
}

export interface FunctionRef {
  readonly kind: "function";
  readonly typeParameters: readonly TypeParameter[];
  readonly params: readonly Parameter[];
  readonly results: readonly TypeRef[];
}

export interface UnionRef {
  readonly kind: "union";
  readonly members: readonly TypeRef[];
}

export interface IntersectionRef {
  readonly kind: "intersection";
  readonly members: readonly TypeRef[];
}

export interface ObjectRef {
  readonly kind: "object";
  readonly members: readonly PropertySignature[];
}

/** Reference to a parameter, result or property type. Immutable once built. */
export type TypeRef =
  | PrimitiveRef
  | LiteralRef
  | NamedRef
  | TypeParameterRef
  | ArrayRef
  | TupleRef
  | MapRef
  | SetRef
  | PromiseRef
  | AsyncIterableRef
  | FunctionRef
  | UnionRef
  | IntersectionRef
  | ObjectRef;

export interface TypeParameter {
  readonly name: string;
  readonly constraint?: TypeRef;
  readonly default?: TypeRef;
}

export interface Parameter {
  /** Declared name, or a synthesized `p<index>` from the reflective backend */
  readonly name: string;
  /** For a variadic parameter, the whole rest type (`string[]`, a tuple, ...) */
  readonly type: TypeRef;
  readonly optional: boolean;
  readonly variadic: boolean;
}

export interface MethodSignature {
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly params: readonly Parameter[];
  /** Empty for void, one entry for a single result, two or more for a tuple return */
  readonly results: readonly TypeRef[];
}

export interface PropertySignature {
  readonly name: string;
  readonly type: TypeRef;
  readonly optional: boolean;
  readonly readonly: boolean;
}

export interface InterfaceModel {
  readonly interfaceName: string;
  /** Module that declares the interface, in the same form as NamedRef.packagePath */
  readonly sourcePackage: string;
  readonly typeParameters: readonly TypeParameter[];
  /** Declaration order, own members before inherited ones */
  readonly methods: readonly MethodSignature[];
  readonly properties: readonly PropertySignature[];
}

export interface GeneratedArtifact {
  readonly interfaceName: string;
  readonly destinationPath: string;
  readonly packageName: string;
  readonly sourceText: string;
  /** Distinct parameter types across all methods, in key order */
  readonly referencedTypes: readonly TypeRef[];
}

export interface MatcherArtifact {
  readonly typeRef: TypeRef;
  /** Identifier the matcher functions are named after, e.g. `ArrayOfWidget` */
  readonly identifier: string;
  readonly destinationPath: string;
  readonly sourceText: string;
}
