/**
 * Fetch Shifts Script
 *
 * Logs in, fetches one date range and writes the shifts to a JSON file.
 *
 * Usage:
 *   npx tsx scripts/fetch-shifts.ts [dateFrom] [dateTo] [--out file]
 *
 * Dates are dd.MM.yyyy. Without dates the current month is fetched.
 */

import fs from 'fs';
import { DateTime } from 'luxon';
import { ConfigError, loadConfig, loadEnv, toSessionManagerConfig } from '../src/config/index.js';
import { SessionManager } from '../src/portals/vinnustund/auth/session-manager.js';
import { createShiftRetrievalService } from '../src/portals/vinnustund/client.js';
import { PORTAL_DATE_FORMAT } from '../src/portals/vinnustund/types/index.js';
import { isShiftServiceError } from '../src/shared/errors.js';
import { getErrorMessage } from '../src/shared/utils/helpers.js';

const DEFAULT_OUTPUT = 'shifts_output.json';
const PREVIEW_COUNT = 3;

interface CliArgs {
  dateFrom: string;
  dateTo: string;
  out: string;
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let out = DEFAULT_OUTPUT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out') {
      const value = argv[i + 1];
      if (!value) {
        throw new Error('--out needs a file name');
      }
      out = value;
      i++;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const now = DateTime.now();
  return {
    dateFrom: positional[0] ?? now.startOf('month').toFormat(PORTAL_DATE_FORMAT),
    dateTo: positional[1] ?? now.endOf('month').toFormat(PORTAL_DATE_FORMAT),
    out
  };
}

async function main(): Promise<void> {
  loadEnv();

  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const sessions = new SessionManager(toSessionManagerConfig({
    ...config,
    refreshAutomatically: false,
    keepAliveEnabled: false
  }));
  const shifts = createShiftRetrievalService(sessions, {
    requestDelay: config.requestDelay,
    logLevel: config.logLevel
  });

  try {
    console.log(`🚀 Fetching shifts ${args.dateFrom} - ${args.dateTo}`);
    const result = await shifts.retrieveShifts(args.dateFrom, args.dateTo);

    console.log(`✅ ${result.count} shifts`);
    for (const shift of result.shifts.slice(0, PREVIEW_COUNT)) {
      console.log(`   ${shift.dayOfWeek} ${shift.date}  ${shift.timeEntered || shift.workHours}  ${shift.totalHours}`);
    }
    if (result.count > PREVIEW_COUNT) {
      console.log(`   ... and ${result.count - PREVIEW_COUNT} more`);
    }

    fs.writeFileSync(args.out, JSON.stringify(result, null, 2), 'utf-8');
    console.log(`💾 Saved to ${args.out}`);
  } finally {
    sessions.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
  } else if (isShiftServiceError(error)) {
    console.error(`❌ ${error.kind}: ${error.message}`);
  } else {
    console.error(`💥 ${getErrorMessage(error)}`);
  }
  process.exit(1);
});
