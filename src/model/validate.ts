import { SignatureConstraintError } from "../core/errors.js";
import { walkSignature } from "./type-ref.js";
import type { InterfaceModel, Parameter, TypeRef } from "./types.js";

function checkParams(owner: string, params: readonly Parameter[]): void {
  const seen = new Set<string>();
  let sawOptional = false;

  params.forEach((param, index) => {
    const label = `${owner} parameter ${param.name || `#${index}`}`;

    if (param.name && seen.has(param.name)) {
      throw new SignatureConstraintError(`Duplicate parameter name in ${label}`, owner);
    }
    if (param.name) seen.add(param.name);

    if (param.variadic) {
      if (index !== params.length - 1) {
        throw new SignatureConstraintError(`Variadic ${label} must be the last parameter`, owner);
      }
      if (param.optional) {
        throw new SignatureConstraintError(`Variadic ${label} cannot be optional`, owner);
      }
      const kind = param.type.kind;
      if (kind !== "array" && kind !== "tuple" && kind !== "typeParameter") {
        throw new SignatureConstraintError(`Variadic ${label} must have an array or tuple type`, owner);
      }
      return;
    }

    if (param.optional) sawOptional = true;
    else if (sawOptional) {
      throw new SignatureConstraintError(`Required ${label} follows an optional parameter`, owner);
    }
  });
}

function checkNestedFunctions(owner: string, ref: TypeRef): void {
  walkSignature({ typeParameters: [], params: [], results: [ref] }, (nested) => {
    if (nested.kind === "function") checkParams(`${owner} (function type)`, nested.params);
  });
}

/**
 * Reject malformed models before any source text is produced: duplicate
 * member names, misplaced variadic parameters, required-after-optional.
 */
export function validateModel(model: InterfaceModel): void {
  const names = new Set<string>();
  const claim = (name: string) => {
    const owner = `${model.interfaceName}.${name}`;
    if (names.has(name)) {
      throw new SignatureConstraintError(`Duplicate member name ${owner}`, owner);
    }
    names.add(name);
  };

  for (const method of model.methods) {
    claim(method.name);
    const owner = `${model.interfaceName}.${method.name}`;
    checkParams(owner, method.params);
    method.params.forEach((p) => checkNestedFunctions(owner, p.type));
    method.results.forEach((r) => checkNestedFunctions(owner, r));
  }

  for (const property of model.properties) {
    claim(property.name);
    checkNestedFunctions(`${model.interfaceName}.${property.name}`, property.type);
  }
}
