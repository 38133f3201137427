import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { ConfigError, createServiceLogger } from '@mailsync/shared';
import { loadSyncConfig } from '@mailsync/sync';
import { USAGE, UsageError, parseArgs } from './args.js';
import { runCommand } from './commands.js';
import { createPipeline, openStores } from './container.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootDir = resolve(__dirname, '../../..');

config({ path: resolve(rootDir, '.env.local') });
config({ path: resolve(rootDir, '.env') });

// stdout carries the reports
const logger = createServiceLogger('mailsync-cli', undefined, { stderr: true });

function printUsage(): void {
  console.log(USAGE);
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.command === undefined || args.flags.has('help')) {
    printUsage();
    return 0;
  }

  const syncConfig = loadSyncConfig();
  const stores = await openStores(syncConfig, logger);
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn('shutdown_signal_received', { signal });
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await runCommand(args, {
      config: syncConfig,
      stores,
      logger,
      out: (line) => console.log(line),
      signal: controller.signal,
      createPipeline: (operation) => createPipeline(syncConfig, stores, operation, logger),
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await stores.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      printUsage();
      process.exitCode = 2;
      return;
    }
    if (error instanceof ConfigError) {
      console.error('Invalid configuration:');
      for (const issue of error.issues) console.error(`  ${issue}`);
      process.exitCode = 1;
      return;
    }
    logger.error('cli_failed', error);
    process.exitCode = 1;
  });
