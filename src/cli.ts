#!/usr/bin/env node
// Scheduled entry (cron / CI timer). Reads `.env` for local runs.
import 'dotenv/config';

import { main } from './index';
import * as logger from './utils/logger';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('Unexpected failure', { error: err instanceof Error ? err.name : typeof err });
    process.exitCode = 1;
  });
