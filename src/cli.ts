#!/usr/bin/env node

import { normalize, renderEquation } from './equation';
import { parseEquation, parseExpression, renderExpression } from './parse';
import { infer, premise } from './syllogism';

const USAGE = `Usage: elective [COMMAND] [OPTIONS] <input>...

COMMANDS:
  parse <expr>                 Parse and pretty-print an elective function
  normalize <equation>         Reduce an equation to normal form
  infer <equation>...          Conjoin premises and eliminate middle terms
  help                         Show this help message

OPTIONS:
  -h, --help                   Show help message
  --vars x,y,z                 Ordered variables to normalize over
  --eliminate y                Symbols to eliminate (infer only)

EXAMPLES:
  elective parse "(1-x)yz"
  elective normalize "x = xy" --vars x,y
  elective infer --vars x,y,z --eliminate y "y = xy" "z = yz"

SYNTAX:
  Symbols:            a, b, ..., z
  Constants:          0, 1
  Negation:           (1-x)
  Product:            xy (juxtaposition)
  Equation:           lhs = rhs
`;

/** Where the CLI writes; stdout and stderr outside of tests. */
export interface Output {
  log: (line: string) => void;
  error: (line: string) => void;
}

type Options = {
  positional: string[];
  vars?: string[];
  eliminate?: string[];
};

function parseArgs(args: string[]): Options {
  const opts: Options = { positional: [] };
  const list = (flag: string, value: string | undefined): string[] => {
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--vars':
        opts.vars = list(arg, args[++i]);
        break;
      case '--eliminate':
        opts.eliminate = list(arg, args[++i]);
        break;
      default:
        if (arg !== undefined) opts.positional.push(arg);
    }
  }
  return opts;
}

/**
 * Runs the CLI against the given arguments and returns the exit code.
 */
export function run(args: string[], out: Output): number {
  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    out.log(USAGE);
    return 0;
  }

  const [command, ...rest] = args;
  if (command === 'help') {
    out.log(USAGE);
    return 0;
  }

  try {
    const opts = parseArgs(rest);
    switch (command) {
      case 'parse': {
        const [input] = opts.positional;
        if (input === undefined) throw new Error('Missing expression argument');
        out.log(renderExpression(parseExpression(input)));
        return 0;
      }
      case 'normalize': {
        const [input] = opts.positional;
        if (input === undefined) throw new Error('Missing equation argument');
        if (!opts.vars) throw new Error('Missing --vars');
        const { lhs, rhs } = parseEquation(input);
        out.log(renderEquation(normalize(lhs, rhs, opts.vars)));
        return 0;
      }
      case 'infer': {
        if (opts.positional.length === 0) {
          throw new Error('Missing premise arguments');
        }
        if (!opts.vars) throw new Error('Missing --vars');
        const result = infer(
          opts.positional.map(premise),
          opts.vars,
          opts.eliminate ?? []
        );
        out.log(result.text);
        return 0;
      }
      default:
        out.error(`Unrecognised command '${command}'.`);
        out.error('Use "elective help" for usage information');
        return 1;
    }
  } catch (error) {
    out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exit(
    run(process.argv.slice(2), { log: console.log, error: console.error })
  );
}
