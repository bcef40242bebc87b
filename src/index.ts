export {
  NodeKind,
  UnboundSymbolError,
  construct,
  equal,
  evaluate,
  getSymbols,
  transform,
} from './ast';
export type {
  Bit,
  Const,
  Expression,
  NodeConstructor,
  Not,
  Product,
  Sym,
  SymbolName,
  TransformFns,
} from './ast';
export {
  ParseError,
  Parser,
  parseEquation,
  parseExpression,
  renderExpression,
  splitEquation,
} from './parse';
export type { ParsedEquation } from './parse';
export {
  DEFAULT_MAX_VARIABLES,
  InvalidVariablesError,
  VariableLimitError,
  assignments,
  equalEquations,
  isContradiction,
  isForbidden,
  isTautology,
  normalize,
  renderEquation,
  sameVariables,
  toAssignment,
  toIndex,
} from './equation';
export type { EngineConfig, Equation } from './equation';
export { VariableMismatchError, conjoin, conjoinAll } from './conjoin';
export { UnknownVariableError, eliminate, eliminateAll } from './eliminate';
export { categorical, infer, premise } from './syllogism';
export type { CategoricalForm, Inference, Premise } from './syllogism';
export {
  DebugLogger,
  LogComponent,
  LogLevel,
  debugLogger,
  loggerConfigFromEnv,
} from './debug-logger';
export type { LoggerConfig } from './debug-logger';
