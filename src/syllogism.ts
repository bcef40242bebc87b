import { SymbolName } from './ast';
import { conjoinAll } from './conjoin';
import { debugLogger, LogComponent } from './debug-logger';
import { eliminateAll } from './eliminate';
import { EngineConfig, Equation, normalize, renderEquation } from './equation';
import { parseExpression, splitEquation } from './parse';

/**
 * A premise as the two sides of an elective equation, in the notation
 * accepted by `parseExpression`.
 */
export type Premise = { lhs: string; rhs: string };

/**
 * Universal categorical forms:
 * - 'A': All S are P, written s = sp
 * - 'E': No S are P, written sp = 0
 *
 * Particular propositions need an auxiliary indefinite symbol (e.g. "Some S
 * are P" as v = sp together with constraints on v), so callers write those
 * premises out themselves.
 */
export type CategoricalForm = 'A' | 'E';

/**
 * Builds the premise for a universal categorical proposition.
 */
export function categorical(
  form: CategoricalForm,
  subject: SymbolName,
  predicate: SymbolName
): Premise {
  switch (form) {
    case 'A':
      return { lhs: subject, rhs: `${subject}${predicate}` };
    case 'E':
      return { lhs: `${subject}${predicate}`, rhs: '0' };
    default: {
      const _exhaustive: never = form;
      throw new Error(`Unknown categorical form ${_exhaustive}`);
    }
  }
}

/**
 * Reads a premise written as a single equation, e.g. `y = xy`. The sides are
 * only parsed when the premise is used.
 */
export function premise(input: string): Premise {
  const [lhs, rhs] = splitEquation(input);
  return { lhs, rhs };
}

export type Inference = {
  /** Each premise normalized over the full variable list. */
  premises: Equation[];
  /** Conjunction of all premises. */
  combined: Equation;
  /** The combined equation with the eliminated symbols projected out. */
  conclusion: Equation;
  /** The rendered conclusion. */
  text: string;
};

/**
 * Draws the conclusion of a set of premises: normalizes each over
 * `variables`, conjoins them and eliminates the middle term(s).
 *
 * @param premises - at least one premise
 * @param variables - the ordered scope of every premise
 * @param eliminated - symbols to eliminate, in order
 */
export function infer(
  premises: readonly Premise[],
  variables: readonly SymbolName[],
  eliminated: readonly SymbolName[],
  cfg?: EngineConfig
): Inference {
  const normalized = premises.map((p) =>
    normalize(parseExpression(p.lhs), parseExpression(p.rhs), variables, cfg)
  );
  const combined = conjoinAll(normalized);
  const conclusion = eliminateAll(combined, eliminated);
  const text = renderEquation(conclusion);

  debugLogger.info(
    LogComponent.SYLLOGISM,
    `Inferred from ${premises.length} premises, eliminating [${eliminated.join(', ')}]: ${text}`
  );

  return { premises: normalized, combined, conclusion, text };
}
