#!/usr/bin/env node
import 'dotenv/config';
import { env } from './config/env';
import { createJobsService, runCli } from './cli';
import { logger } from './utils/logger';

async function main() {
  process.exitCode = await runCli(process.argv, createJobsService(env));
}

main().catch((error: unknown) => {
  logger.fatal(error);
  process.exitCode = 1;
});
