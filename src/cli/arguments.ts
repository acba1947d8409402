/**
 * Command line parsing for `compute-sales`.
 */

import {ReportMode} from '../domain';
import {Either, Just, Left, Maybe, Nothing, Right} from 'purify-ts';

export const USAGE = `Usage: compute-sales <catalogue.json> <sales.json> [--total | --detail] [--output <file>]

Compute total sales from a product catalogue and a sales record.

Arguments:
  catalogue.json   JSON array of products ({"title", "price"})
  sales.json       JSON array of sale lines ({"SALE_ID", "Product", "Quantity", "SALE_Date"})

Options:
  --total          Show only the grand total (default)
  --detail         Show the full itemized report
  --output <file>  Write the report to <file> instead of SalesResults.txt
  -h, --help       Show this help`;

export type CliArguments = {
  readonly cataloguePath: string;
  readonly salesPath: string;
  readonly mode: ReportMode;
  readonly output: Maybe<string>;
};

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'run'; readonly args: CliArguments };

type ParseState = {
  readonly positionals: readonly string[];
  readonly modes: readonly ReportMode[];
  readonly output: Maybe<string>;
  readonly help: boolean;
};

const modeFlags: Record<string, ReportMode> = {
  '--total': 'total',
  '--detail': 'detail',
};

function parseTokens(argv: readonly string[]): Either<string, ParseState> {
  let state: ParseState = {positionals: [], modes: [], output: Nothing, help: false};
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (optionsEnded || token === '-' || !token.startsWith('-')) {
      state = {...state, positionals: [...state.positionals, token]};
    } else if (token === '--') {
      optionsEnded = true;
    } else if (token === '-h' || token === '--help') {
      return Right({...state, help: true});
    } else if (token in modeFlags) {
      state = {...state, modes: [...state.modes, modeFlags[token]]};
    } else if (token === '--output') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        return Left('argument --output: expected one argument');
      }
      state = {...state, output: Just(value)};
      i++;
    } else if (token.startsWith('--output=')) {
      const value = token.slice('--output='.length);
      if (!value) {
        return Left('argument --output: expected one argument');
      }
      state = {...state, output: Just(value)};
    } else {
      return Left(`unrecognized argument: ${token}`);
    }
  }

  return Right(state);
}

function resolveMode(modes: readonly ReportMode[]): Either<string, ReportMode> {
  const distinct = [...new Set(modes)];
  if (distinct.length > 1) {
    return Left('argument --detail: not allowed with argument --total');
  }
  return Right(distinct[0] ?? 'total');
}

/**
 * Parse the arguments after the program name. Parsing stops at `--help`.
 */
export function parseArguments(argv: readonly string[]): Either<string, CliCommand> {
  return parseTokens(argv).chain((state): Either<string, CliCommand> => {
    if (state.help) {
      return Right({kind: 'help'});
    }
    const [cataloguePath, salesPath, ...extra] = state.positionals;
    if (cataloguePath === undefined || salesPath === undefined) {
      const missing = cataloguePath === undefined ? 'catalogue, sales' : 'sales';
      return Left(`the following arguments are required: ${missing}`);
    }
    if (extra.length > 0) {
      return Left(`unrecognized arguments: ${extra.join(' ')}`);
    }
    return resolveMode(state.modes).map((mode): CliCommand => ({
      kind: 'run',
      args: {cataloguePath, salesPath, mode, output: state.output},
    }));
  });
}
