#!/usr/bin/env node
import { formatError } from './errors';
import { logger } from './logger';
import { main } from './main';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('dg-srt crashed', { error: formatError(err) });
    process.exit(1);
  });
