/**
 * AST → IR lowering pass.
 *
 * Takes a parsed Program and populates an IrContext: named types are
 * interned, functions are declared, and each function body is lowered into
 * basic blocks while every expression's type is resolved and checked.
 * User errors are collected as diagnostics and lowering carries on with the
 * next statement; internal invariant violations throw.
 *
 * Method implementations are split across:
 *   - lowering-decl.ts        (type and function declarations, bodies)
 *   - lowering-stmt.ts        (statement and control-flow lowering)
 *   - lowering-match.ts       (match statements)
 *   - lowering-expr.ts        (expression lowering)
 *   - lowering-literals.ts    (literal expression lowering)
 *   - lowering-operators.ts   (binary and unary operator typing)
 *   - lowering-types.ts       (type annotation resolution)
 *   - lowering-scope.ts       (variable scopes)
 *   - lowering-utils.ts       (basic block helpers)
 */

import type { Program } from "../ast/nodes.ts";
import type { Diagnostic } from "../errors/diagnostic.ts";
import type { FileId } from "../utils/source.ts";
import type { IrContext } from "./context.ts";
import type { BBId, FunId, TypeId, VarId } from "./ir-types.ts";

import * as declMethods from "./lowering-decl.ts";
import * as exprMethods from "./lowering-expr.ts";
import * as literalMethods from "./lowering-literals.ts";
import * as matchMethods from "./lowering-match.ts";
import * as operatorMethods from "./lowering-operators.ts";
import * as scopeMethods from "./lowering-scope.ts";
import * as stmtMethods from "./lowering-stmt.ts";
import * as typeMethods from "./lowering-types.ts";
import * as utilMethods from "./lowering-utils.ts";

// ─── Options ─────────────────────────────────────────────────────────────────

export interface LowerOptions {
  /** Stop lowering further functions once this many diagnostics were reported. */
  maxErrors: number;
}

export const DEFAULT_LOWER_OPTIONS: LowerOptions = {
  maxErrors: Number.POSITIVE_INFINITY,
};

interface LoopTargets {
  breakTo: BBId;
  continueTo: BBId;
}

// ─── Lowerer ─────────────────────────────────────────────────────────────────

export class IrLowerer {
  readonly ctx: IrContext;
  readonly file: FileId;
  readonly options: LowerOptions;

  diagnostics: Diagnostic[] = [];

  // Module-level names
  typeNames: Map<string, TypeId> = new Map();
  funNames: Map<string, FunId> = new Map();

  // Current function state
  currentFun: FunId | null = null;
  currentBB: BBId | null = null;
  /** Innermost scope last. */
  scopes: Map<string, VarId>[] = [];
  loopStack: LoopTargets[] = [];

  constructor(ctx: IrContext, file: FileId, options: Partial<LowerOptions> = {}) {
    this.ctx = ctx;
    this.file = file;
    this.options = { ...DEFAULT_LOWER_OPTIONS, ...options };
  }

  /** Lower every declaration of `program`. Returns the functions it declared. */
  lowerProgram(program: Program): FunId[] {
    const typeDecls = program.declarations.flatMap((d) => (d.kind === "TypeDecl" ? [d] : []));
    const funDecls = program.declarations.flatMap((d) => (d.kind === "FunctionDecl" ? [d] : []));

    // Names first, so declarations may refer to each other in any order.
    const aliases = typeDecls.map((decl) => this.declareTypeName(decl));
    typeDecls.forEach((decl, i) => {
      const alias = aliases[i];
      if (alias !== null) this.resolveTypeDecl(decl, alias);
    });
    typeDecls.forEach((decl, i) => {
      const alias = aliases[i];
      if (alias !== null) this.checkRecursiveAlias(decl, alias);
    });

    const declared: { id: FunId; decl: (typeof funDecls)[number] }[] = [];
    for (const decl of funDecls) {
      const id = this.declareFunction(decl);
      if (id !== null) declared.push({ id, decl });
    }

    for (const { id, decl } of declared) {
      if (this.errorLimitReached()) break;
      if (decl.body !== null && !decl.isExtern) {
        this.lowerFunctionBody(id, decl, decl.body);
      }
    }

    return declared.map((d) => d.id);
  }

  report(diag: Diagnostic): void {
    this.diagnostics.push(diag);
  }

  errorLimitReached(): boolean {
    return this.diagnostics.length >= this.options.maxErrors;
  }

  // ─── Declaration methods (from lowering-decl.ts) ────────────────────────
  declare declareTypeName: typeof declMethods.declareTypeName;
  declare resolveTypeDecl: typeof declMethods.resolveTypeDecl;
  declare checkRecursiveAlias: typeof declMethods.checkRecursiveAlias;
  declare declareFunction: typeof declMethods.declareFunction;
  declare lowerFunctionBody: typeof declMethods.lowerFunctionBody;

  // ─── Statement methods (from lowering-stmt.ts) ─────────────────────────
  declare lowerBlock: typeof stmtMethods.lowerBlock;
  declare lowerScopedBlock: typeof stmtMethods.lowerScopedBlock;
  declare lowerStatement: typeof stmtMethods.lowerStatement;
  declare lowerLetStmt: typeof stmtMethods.lowerLetStmt;
  declare lowerAssignStmt: typeof stmtMethods.lowerAssignStmt;
  declare lowerExprStmt: typeof stmtMethods.lowerExprStmt;
  declare lowerReturnStmt: typeof stmtMethods.lowerReturnStmt;
  declare lowerIfStmt: typeof stmtMethods.lowerIfStmt;
  declare lowerWhileStmt: typeof stmtMethods.lowerWhileStmt;
  declare lowerLoopExit: typeof stmtMethods.lowerLoopExit;
  declare lowerCondition: typeof stmtMethods.lowerCondition;

  // ─── Match methods (from lowering-match.ts) ────────────────────────────
  declare lowerMatchStmt: typeof matchMethods.lowerMatchStmt;

  // ─── Expression methods (from lowering-expr.ts) ────────────────────────
  declare lowerExpr: typeof exprMethods.lowerExpr;
  declare lowerIdentifier: typeof exprMethods.lowerIdentifier;
  declare lowerCallExpr: typeof exprMethods.lowerCallExpr;
  declare lowerMemberExpr: typeof exprMethods.lowerMemberExpr;
  declare lowerIndexExpr: typeof exprMethods.lowerIndexExpr;
  declare lowerCastExpr: typeof exprMethods.lowerCastExpr;

  // ─── Literal methods (from lowering-literals.ts) ────────────────────────
  declare lowerIntLiteral: typeof literalMethods.lowerIntLiteral;
  declare lowerFloatLiteral: typeof literalMethods.lowerFloatLiteral;
  declare lowerStructLiteral: typeof literalMethods.lowerStructLiteral;
  declare lowerArrayLiteral: typeof literalMethods.lowerArrayLiteral;

  // ─── Operator methods (from lowering-operators.ts) ──────────────────────
  declare lowerBin: typeof operatorMethods.lowerBin;
  declare lowerUnary: typeof operatorMethods.lowerUnary;

  // ─── Type methods (from lowering-types.ts) ──────────────────────────────
  declare lowerTypeNode: typeof typeMethods.lowerTypeNode;

  // ─── Scope methods (from lowering-scope.ts) ─────────────────────────────
  declare pushScope: typeof scopeMethods.pushScope;
  declare popScope: typeof scopeMethods.popScope;
  declare declareVar: typeof scopeMethods.declareVar;
  declare lookupVar: typeof scopeMethods.lookupVar;

  // ─── Utility methods (from lowering-utils.ts) ──────────────────────────
  declare newBlock: typeof utilMethods.newBlock;
  declare startBlock: typeof utilMethods.startBlock;
  declare currentBlock: typeof utilMethods.currentBlock;
  declare appendStmt: typeof utilMethods.appendStmt;
  declare setTerminator: typeof utilMethods.setTerminator;
  declare isBlockTerminated: typeof utilMethods.isBlockTerminated;
  declare jumpIfOpen: typeof utilMethods.jumpIfOpen;
}

// ─── Attach extracted methods to IrLowerer prototype ─────────────────────────

// Declaration methods
IrLowerer.prototype.declareTypeName = declMethods.declareTypeName;
IrLowerer.prototype.resolveTypeDecl = declMethods.resolveTypeDecl;
IrLowerer.prototype.checkRecursiveAlias = declMethods.checkRecursiveAlias;
IrLowerer.prototype.declareFunction = declMethods.declareFunction;
IrLowerer.prototype.lowerFunctionBody = declMethods.lowerFunctionBody;

// Statement methods
IrLowerer.prototype.lowerBlock = stmtMethods.lowerBlock;
IrLowerer.prototype.lowerScopedBlock = stmtMethods.lowerScopedBlock;
IrLowerer.prototype.lowerStatement = stmtMethods.lowerStatement;
IrLowerer.prototype.lowerLetStmt = stmtMethods.lowerLetStmt;
IrLowerer.prototype.lowerAssignStmt = stmtMethods.lowerAssignStmt;
IrLowerer.prototype.lowerExprStmt = stmtMethods.lowerExprStmt;
IrLowerer.prototype.lowerReturnStmt = stmtMethods.lowerReturnStmt;
IrLowerer.prototype.lowerIfStmt = stmtMethods.lowerIfStmt;
IrLowerer.prototype.lowerWhileStmt = stmtMethods.lowerWhileStmt;
IrLowerer.prototype.lowerLoopExit = stmtMethods.lowerLoopExit;
IrLowerer.prototype.lowerCondition = stmtMethods.lowerCondition;

// Match methods
IrLowerer.prototype.lowerMatchStmt = matchMethods.lowerMatchStmt;

// Expression methods
IrLowerer.prototype.lowerExpr = exprMethods.lowerExpr;
IrLowerer.prototype.lowerIdentifier = exprMethods.lowerIdentifier;
IrLowerer.prototype.lowerCallExpr = exprMethods.lowerCallExpr;
IrLowerer.prototype.lowerMemberExpr = exprMethods.lowerMemberExpr;
IrLowerer.prototype.lowerIndexExpr = exprMethods.lowerIndexExpr;
IrLowerer.prototype.lowerCastExpr = exprMethods.lowerCastExpr;

// Literal methods
IrLowerer.prototype.lowerIntLiteral = literalMethods.lowerIntLiteral;
IrLowerer.prototype.lowerFloatLiteral = literalMethods.lowerFloatLiteral;
IrLowerer.prototype.lowerStructLiteral = literalMethods.lowerStructLiteral;
IrLowerer.prototype.lowerArrayLiteral = literalMethods.lowerArrayLiteral;

// Operator methods
IrLowerer.prototype.lowerBin = operatorMethods.lowerBin;
IrLowerer.prototype.lowerUnary = operatorMethods.lowerUnary;

// Type methods
IrLowerer.prototype.lowerTypeNode = typeMethods.lowerTypeNode;

// Scope methods
IrLowerer.prototype.pushScope = scopeMethods.pushScope;
IrLowerer.prototype.popScope = scopeMethods.popScope;
IrLowerer.prototype.declareVar = scopeMethods.declareVar;
IrLowerer.prototype.lookupVar = scopeMethods.lookupVar;

// Utility methods
IrLowerer.prototype.newBlock = utilMethods.newBlock;
IrLowerer.prototype.startBlock = utilMethods.startBlock;
IrLowerer.prototype.currentBlock = utilMethods.currentBlock;
IrLowerer.prototype.appendStmt = utilMethods.appendStmt;
IrLowerer.prototype.setTerminator = utilMethods.setTerminator;
IrLowerer.prototype.isBlockTerminated = utilMethods.isBlockTerminated;
IrLowerer.prototype.jumpIfOpen = utilMethods.jumpIfOpen;

// ─── Public API ──────────────────────────────────────────────────────────────

export interface LoweringResult {
  funs: FunId[];
  diagnostics: Diagnostic[];
}

export function lowerProgram(
  ctx: IrContext,
  program: Program,
  options: Partial<LowerOptions> = {}
): LoweringResult {
  const lowerer = new IrLowerer(ctx, program.file, options);
  const funs = lowerer.lowerProgram(program);
  return { funs, diagnostics: lowerer.diagnostics };
}
