/**
 * Raised when the compiler itself is malformed: a handle used against the
 * wrong store, a basic block left without a terminator, IR the backend
 * cannot represent. Never used for errors in the program being compiled.
 */
export class IrInvariantError extends Error {
  constructor(message: string) {
    super(`internal compiler error: ${message}`);
    this.name = "IrInvariantError";
  }
}
