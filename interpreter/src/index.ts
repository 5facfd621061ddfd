/**
 * Public entry point of the Sprig interpreter package.
 */

export * from './ast';
export * from './errors';
export * from './values';
export { Environment } from './environment';
export { Token, TokenKind, LexOptions, tokenize } from './lexer';
export { parse, parseTokens } from './parser';
export {
  OutputSink,
  BUILTIN_NAMES,
  registerBuiltins,
  stdoutSink,
  checkArity,
  checkMinArity,
  expectNumber,
} from './builtins';
export { Interpreter, InterpreterOptions } from './interpreter';
export { STDLIB_NAMES, registerStdlib } from './stdlib';
export { ReplSession, ReplResponse, StartReplOptions, hasUnclosedDelimiters, startRepl, VERSION } from './repl';
