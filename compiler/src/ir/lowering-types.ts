/**
 * Type annotation resolution for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type { TypeNode } from "../ast/nodes.ts";
import {
  type Diagnostic,
  DiagnosticCode,
  errorDiagnostic,
  primaryLabel,
} from "../errors/diagnostic.ts";
import { error, ok, type Result } from "../utils/result.ts";
import { IrContext } from "./context.ts";
import type { IrFunArg, IrStructField, TypeId } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

/** Type names every program can use without declaring them. */
export const BUILTIN_TYPES: ReadonlyMap<string, TypeId> = new Map([
  ["i8", IrContext.I8],
  ["i16", IrContext.I16],
  ["i32", IrContext.I32],
  ["i64", IrContext.I64],
  ["u8", IrContext.U8],
  ["u16", IrContext.U16],
  ["u32", IrContext.U32],
  ["u64", IrContext.U64],
  ["bool", IrContext.BOOL],
  ["f32", IrContext.F32],
  ["f64", IrContext.F64],
]);

export function lowerTypeNode(this: IrLowerer, node: TypeNode): Result<TypeId, Diagnostic> {
  switch (node.kind) {
    case "NamedType": {
      const id = BUILTIN_TYPES.get(node.name) ?? this.typeNames.get(node.name);
      if (id === undefined) {
        return error(
          errorDiagnostic(DiagnosticCode.UnknownType, `Unknown type '${node.name}'`, [
            primaryLabel(this.file, node.span),
          ])
        );
      }
      return ok(id);
    }

    case "UnitType":
      return ok(IrContext.UNIT);

    case "PtrType": {
      const pointee = this.lowerTypeNode(node.pointee);
      if (!pointee.ok) return pointee;
      return ok(this.ctx.ptrTo(pointee.value));
    }

    case "ArrayType": {
      const element = this.lowerTypeNode(node.element);
      if (!element.ok) return element;
      return ok(this.ctx.types.insert({ kind: "array", element: element.value, len: node.length }));
    }

    case "StructTypeNode": {
      const fields: IrStructField[] = [];
      for (const field of node.fields) {
        if (fields.some((f) => f.name === field.name)) {
          return error(
            errorDiagnostic(
              DiagnosticCode.DuplicateDefinition,
              `Field '${field.name}' is declared more than once`,
              [primaryLabel(this.file, field.span)]
            )
          );
        }
        const ty = this.lowerTypeNode(field.type);
        if (!ty.ok) return ty;
        fields.push({ ty: ty.value, name: field.name });
      }
      return ok(this.ctx.types.insert({ kind: "struct", fields }));
    }

    case "SumTypeNode": {
      const variants: TypeId[] = [];
      for (const variant of node.variants) {
        const ty = this.lowerTypeNode(variant);
        if (!ty.ok) return ty;
        if (variants.includes(ty.value)) {
          return error(
            errorDiagnostic(
              DiagnosticCode.DuplicateDefinition,
              `Variant ${this.ctx.typename(ty.value)} appears more than once in a sum type`,
              [primaryLabel(this.file, variant.span)]
            )
          );
        }
        variants.push(ty.value);
      }
      return ok(this.ctx.types.insert({ kind: "sum", variants }));
    }

    case "FunTypeNode": {
      const args: IrFunArg[] = [];
      for (const arg of node.args) {
        const ty = this.lowerTypeNode(arg.type);
        if (!ty.ok) return ty;
        args.push({ ty: ty.value, name: arg.name });
      }
      const returnTy = this.lowerTypeNode(node.returnType);
      if (!returnTy.ok) return returnTy;
      return ok(this.ctx.types.insert({ kind: "fun", args, returnTy: returnTy.value }));
    }
  }
}
