/**
 * Match statement lowering for IrLowerer.
 * Extracted from lowering-stmt.ts for modularity.
 *
 * `match e { T x => {...} ... else => {...} }` becomes a `jmp_match` on the
 * sum value, one block per arm, and a join block after the match. Each arm
 * binds its variable to the payload of the matched variant.
 */

import type { MatchArm, MatchStmt } from "../ast/nodes.ts";
import { DiagnosticCode, errorDiagnostic, primaryLabel } from "../errors/diagnostic.ts";
import { indexFromRaw } from "../utils/arena.ts";
import type { BBId, DiscriminantId, IrExpr, TypeId } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

interface LoweredArm {
  arm: MatchArm;
  variantTy: TypeId;
  discriminant: DiscriminantId;
  block: BBId;
}

export function lowerMatchStmt(this: IrLowerer, stmt: MatchStmt): void {
  const lowered = this.lowerExpr(stmt.subject);
  if (!lowered.ok) {
    this.report(lowered.error);
    return;
  }
  const subjectTy = lowered.value.ty;
  const sumTy = this.ctx.resolved(subjectTy);
  if (sumTy.kind === "invalid") return;
  if (sumTy.kind !== "sum") {
    this.report(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot match on non-sum type ${this.ctx.typename(subjectTy)}`,
        [primaryLabel(this.file, lowered.value.span)]
      )
    );
    return;
  }

  // Evaluate the subject once; the arms read their payload from it.
  let subject: IrExpr = lowered.value;
  if (subject.kind !== "var" && subject.kind !== "arg") {
    const temp = this.declareVar("match.subject", subjectTy);
    this.appendStmt({ kind: "store", var: temp, val: subject });
    subject = { kind: "var", var: temp, span: subject.span, ty: subjectTy };
  }

  const arms: LoweredArm[] = [];
  for (const arm of stmt.arms) {
    const variantTy = this.lowerTypeNode(arm.type);
    if (!variantTy.ok) {
      this.report(variantTy.error);
      continue;
    }
    const index = sumTy.variants.indexOf(variantTy.value);
    if (index < 0) {
      this.report(
        errorDiagnostic(
          DiagnosticCode.InvalidMatchArm,
          `Type ${this.ctx.typename(variantTy.value)} is not a variant of ${this.ctx.typename(subjectTy)}`,
          [primaryLabel(this.file, arm.type.span)]
        )
      );
      continue;
    }
    if (arms.some((a) => a.variantTy === variantTy.value)) {
      this.report(
        errorDiagnostic(
          DiagnosticCode.InvalidMatchArm,
          `Variant ${this.ctx.typename(variantTy.value)} is matched more than once`,
          [primaryLabel(this.file, arm.type.span)]
        )
      );
      continue;
    }
    arms.push({
      arm,
      variantTy: variantTy.value,
      discriminant: indexFromRaw<TypeId>(index),
      block: this.newBlock(),
    });
  }

  const defaultBB = stmt.defaultBlock !== null ? this.newBlock() : null;
  const endBB = this.newBlock();

  this.setTerminator({
    kind: "jmp_match",
    variant: subject,
    discriminants: arms.map((a): [DiscriminantId, BBId] => [a.discriminant, a.block]),
    defaultJmp: defaultBB ?? endBB,
  });

  for (const { arm, variantTy, discriminant, block } of arms) {
    this.startBlock(block);
    this.pushScope();
    const binding = this.declareVar(arm.binding, variantTy);
    this.appendStmt({
      kind: "store",
      var: binding,
      val: { kind: "payload", value: subject, discriminant, span: arm.span, ty: variantTy },
    });
    this.lowerBlock(arm.body);
    this.popScope();
    this.jumpIfOpen(endBB);
  }

  if (stmt.defaultBlock !== null && defaultBB !== null) {
    this.startBlock(defaultBB);
    this.lowerScopedBlock(stmt.defaultBlock);
    this.jumpIfOpen(endBB);
  }

  this.startBlock(endBB);
}
