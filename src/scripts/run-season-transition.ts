/**
 * Season Transition Runner
 *
 * Rolls one season into the next. Can be invoked as a Lambda function or
 * run locally:
 *
 *   deadpool-transition --from 2025 --to 2026 [--dry-run] [--verbose] [--table Deadpool]
 *
 * Exits 0 when the transition validated cleanly, 1 otherwise.
 */

import { parseArgs } from 'node:util';
import { loadEnvironmentConfig } from '../config/environment';
import { createDeadpoolEngine } from '../index';
import { TransitionReport } from '../models/season-transition';
import { ValidationError, ValidationFailureError } from '../models/errors';
import { assertTransitionPassed } from '../services/season-transition-service';
import { log, LogLevel } from '../utils/logger';

export interface SeasonTransitionEvent {
  fromYear: number;
  toYear: number;
  dryRun?: boolean;
  verbose?: boolean;
  tableName?: string;
}

interface SeasonTransitionResult {
  success: boolean;
  message: string;
  report?: TransitionReport;
  errors?: string[];
}

/**
 * Parse command line arguments into a transition event
 *
 * @throws ValidationError on missing or non-numeric years
 */
export function parseTransitionArgs(argv: string[]): SeasonTransitionEvent {
  const { values } = parseArgs({
    args: argv,
    options: {
      from: { type: 'string' },
      to: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      table: { type: 'string' },
    },
    strict: true,
  });

  const fromYear = Number(values.from);
  const toYear = Number(values.to);
  if (!Number.isInteger(fromYear) || !Number.isInteger(toYear)) {
    throw new ValidationError('--from and --to must be integer years', {
      from: values.from,
      to: values.to,
    });
  }

  return {
    fromYear,
    toYear,
    dryRun: values['dry-run'],
    verbose: values.verbose,
    tableName: values.table,
  };
}

/**
 * Run a season transition and summarize the outcome
 */
export async function runSeasonTransition(event: SeasonTransitionEvent): Promise<SeasonTransitionResult> {
  try {
    const config = loadEnvironmentConfig();
    const engine = createDeadpoolEngine({
      config: { ...config, dynamodbTableName: event.tableName ?? config.dynamodbTableName },
    });

    const report = await engine.runSeasonTransition(event.fromYear, event.toYear, {
      dryRun: event.dryRun,
      verbose: event.verbose,
    });

    try {
      assertTransitionPassed(report);
    } catch (error) {
      if (!(error instanceof ValidationFailureError)) {
        throw error;
      }
      return {
        success: false,
        message: error.message,
        report,
        errors: error.errors,
      };
    }

    return {
      success: true,
      message: `Season transition ${event.fromYear} to ${event.toYear} ${report.dry_run ? 'dry run ' : ''}completed`,
      report,
    };
  } catch (error) {
    log(LogLevel.ERROR, 'Season transition failed', { error });
    return {
      success: false,
      message: 'Season transition failed',
      errors: [error instanceof Error ? error.message : 'Unknown error'],
    };
  }
}

/**
 * Lambda handler for running a season transition
 */
export async function handler(event: SeasonTransitionEvent): Promise<{ statusCode: number; body: string }> {
  const result = await runSeasonTransition(event);

  return {
    statusCode: result.success ? 200 : 500,
    body: JSON.stringify(result),
  };
}

if (require.main === module) {
  Promise.resolve()
    .then(() => runSeasonTransition(parseTransitionArgs(process.argv.slice(2))))
    .then((result) => {
      console.log(JSON.stringify(result, null, 2));
      process.exit(result.success ? 0 : 1);
    })
    .catch((error) => {
      console.error('Fatal error:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
