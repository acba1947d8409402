#!/usr/bin/env node
/**
 * COMMAND LINE ENTRY POINT
 *
 * compute-sales priceCatalogue.json salesRecord.json [--total | --detail]
 *
 * Exit status: 0 on success (including a report that could not be saved),
 * 1 on a fatal input error, 2 on a usage error.
 */
import {loadConfigFromEnv, makeAppEffects} from '../effects/EffectsFactory';
import {SalesReportConfig} from '../effects/types';
import {AppEffects} from '../pure/effects';
import {runSalesReport} from '../pure/salesReporting';
import {describeFatalError} from '../pure/diagnostics';
import {CliArguments, parseArguments, USAGE} from './arguments';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function runReport(args: CliArguments, config: SalesReportConfig, appEffects: AppEffects): number {
  const request = {
    cataloguePath: args.cataloguePath,
    salesPath: args.salesPath,
    mode: args.mode,
    reportPath: args.output.orDefault(config.reportFile),
  };

  return runSalesReport(request)(appEffects).caseOf({
    Left: error => {
      appEffects.diagnostics.error(describeFatalError(error));
      return EXIT_FAILURE;
    },
    Right: () => EXIT_SUCCESS,
  });
}

export function main(
  argv: readonly string[],
  config: SalesReportConfig = loadConfigFromEnv(),
  makeEffects: (config: SalesReportConfig) => AppEffects = makeAppEffects
): number {
  return parseArguments(argv).caseOf({
    Left: message => {
      console.error(`compute-sales: error: ${message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    },
    Right: command => {
      if (command.kind === 'help') {
        console.log(USAGE);
        return EXIT_SUCCESS;
      }
      return runReport(command.args, config, makeEffects(config));
    },
  });
}

if (require.main === module) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (error) {
    console.error('Unexpected failure while computing sales:', error);
    process.exitCode = EXIT_FAILURE;
  }
}
