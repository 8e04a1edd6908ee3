#!/usr/bin/env node
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { loadAppContext } from './bootstrap.js';
import { formatScanReport } from './scanReport.js';

/**
 * One scan pass from the command line: `burnin-scan [config-path]`.
 * Exit code 0 when every enabled device committed, 2 when some failed.
 */

dotenv.config();

const env = validateEnv();
const configPath = process.argv[2] ?? env.COUNTER_CONFIG_PATH;

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const abortController = new AbortController();
process.on('SIGINT', () => {
  loggerInstance.warn('SIGINT received, finishing the current device and stopping');
  abortController.abort();
});

try {
  const context = await loadAppContext({ ...env, COUNTER_CONFIG_PATH: configPath });
  try {
    const report = await context.scanService.runPass({ signal: abortController.signal });
    process.stdout.write(`${formatScanReport(report)}\n`);
    process.exitCode = report.failed > 0 ? 2 : 0;
  } finally {
    context.db.close();
  }
} catch (error) {
  loggerInstance.error('Scan failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
}
