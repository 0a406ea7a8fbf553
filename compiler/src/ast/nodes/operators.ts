/**
 * Operator tags produced by the parser. The enum value is the operator's
 * source spelling, which is also how diagnostics print it.
 */
export enum Op {
  Add = "+",
  Sub = "-",
  Star = "*",
  Div = "/",
  Mod = "%",

  Eq = "==",
  NotEq = "!=",
  Greater = ">",
  GreaterEq = ">=",
  Less = "<",
  LessEq = "<=",

  ShLeft = "<<",
  ShRight = ">>",

  LogicalAnd = "&&",
  LogicalOr = "||",
  LogicalNot = "!",

  /** `&`: bitwise and as a binary operator, address-of as a unary one. */
  AND = "&",
  OR = "|",
  XOR = "^",
  /** `~`: bitwise complement. */
  NOT = "~",
}
