import { Bit, SymbolName } from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';
import { assignments, Equation, renderEquation, toIndex } from './equation';

/**
 * Represents an attempt to eliminate a symbol the equation does not range
 * over.
 */
export class UnknownVariableError extends Error {
  constructor(
    public readonly symbol: SymbolName,
    public readonly variables: readonly SymbolName[]
  ) {
    super(
      `cannot eliminate '${symbol}' from an equation over [${variables.join(', ')}]`
    );
    this.name = 'UnknownVariableError';
  }
}

/**
 * Eliminates a symbol from an equation. An assignment to the remaining
 * variables stays forbidden only if it is forbidden for both values of the
 * eliminated symbol, i.e. no value of the symbol can satisfy the equation.
 */
export function eliminate(eq: Equation, symbol: SymbolName): Equation {
  const k = eq.variables.indexOf(symbol);
  if (k < 0) {
    throw new UnknownVariableError(symbol, eq.variables);
  }

  const variables = eq.variables.filter((_, i) => i !== k);
  const forbidden: Bit[] = [];
  for (const rest of assignments(variables.length)) {
    const withValue = (b: Bit) => [...rest.slice(0, k), b, ...rest.slice(k)];
    const both =
      eq.forbidden[toIndex(withValue(0))] === 1 &&
      eq.forbidden[toIndex(withValue(1))] === 1;
    forbidden.push(both ? 1 : 0);
  }

  const result: Equation = { variables, forbidden };
  debugLogger.logEquation(
    LogComponent.ELIMINATION,
    LogLevel.DEBUG,
    `Eliminated '${symbol}'`,
    () => renderEquation(result)
  );
  return result;
}

/**
 * Eliminates each of the given symbols in turn.
 */
export function eliminateAll(
  eq: Equation,
  symbols: readonly SymbolName[]
): Equation {
  return symbols.reduce(eliminate, eq);
}
