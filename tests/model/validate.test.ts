import { describe, it, expect } from "vitest";
import { SignatureConstraintError } from "../../src/core/errors.js";
import { primitive } from "../../src/model/type-ref.js";
import type { InterfaceModel, MethodSignature, Parameter } from "../../src/model/types.js";
import { validateModel } from "../../src/model/validate.js";

const string = primitive("string");
const strings = { kind: "array", element: string, readonly: false } as const;

function param(name: string, overrides: Partial<Parameter> = {}): Parameter {
  return { name, type: string, optional: false, variadic: false, ...overrides };
}

function model(methods: MethodSignature[]): InterfaceModel {
  return { interfaceName: "Store", sourcePackage: "/m", typeParameters: [], methods, properties: [] };
}

function method(name: string, params: Parameter[]): MethodSignature {
  return { name, typeParameters: [], params, results: [] };
}

describe("validateModel", () => {
  it("accepts a well-formed model", () => {
    expect(() =>
      validateModel(model([method("put", [param("key"), param("tags", { type: strings, variadic: true })])])),
    ).not.toThrow();
  });

  it("rejects a variadic parameter that is not last", () => {
    const bad = model([method("put", [param("tags", { type: strings, variadic: true }), param("key")])]);
    expect(() => validateModel(bad)).toThrow(SignatureConstraintError);
    expect(() => validateModel(bad)).toThrow("Variadic Store.put parameter tags must be the last parameter");
  });

  it("rejects a variadic parameter without an array type", () => {
    expect(() => validateModel(model([method("put", [param("tags", { variadic: true })])]))).toThrow(
      "Variadic Store.put parameter tags must have an array or tuple type",
    );
  });

  it("rejects duplicate parameter and member names", () => {
    expect(() => validateModel(model([method("put", [param("key"), param("key")])]))).toThrow(
      "Duplicate parameter name in Store.put parameter key",
    );
    expect(() => validateModel(model([method("put", []), method("put", [])]))).toThrow("Duplicate member name Store.put");
  });

  it("rejects a required parameter after an optional one", () => {
    expect(() => validateModel(model([method("put", [param("a", { optional: true }), param("b")])]))).toThrow(
      "Required Store.put parameter b follows an optional parameter",
    );
  });

  it("checks function types nested in parameters", () => {
    const callback = {
      kind: "function",
      typeParameters: [],
      params: [param("x", { type: strings, variadic: true }), param("y")],
      results: [],
    } as const;
    const error = (() => {
      try {
        validateModel(model([method("watch", [param("cb", { type: callback })])]));
      } catch (err) {
        return err;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(SignatureConstraintError);
    expect(error).toMatchObject({ identifier: "Store.watch (function type)" });
  });
});
