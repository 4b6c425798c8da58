#!/usr/bin/env node
import { createLogger } from '../utils/logger.js';
import { main } from './index.js';

const logger = createLogger('cli');

main().catch((error: unknown) => {
  logger.error({ err: error }, 'CLI error');
  process.exit(1);
});
