import 'dotenv/config';

import { main } from '@/cli/chat.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'main' });

async function start(): Promise<void> {
  try {
    process.exitCode = await main(process.argv.slice(2));
  } catch (err: unknown) {
    console.error('Fatal error:', err);
    logger.fatal('Chat client crashed', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  }
}

void start();
