#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createSyncContext } from './shared/context';
import { ConfigError, errorMessage } from './shared/errors';
import { DEFAULT_CONFIG_FILE, loadConfig, type SyncConfig } from './shared/env/loadConfig';
import { parseLogLevel } from './shared/logging/logger';
import { FingerprintStore } from './shared/persistence/fingerprintStore';
import { createSyncRunner } from './orchestration/runner';
import { startScheduler } from './orchestration/scheduler';
import { cleanupArchive, cleanupWorking } from './stages/lifecycle/retention';

const argv = yargs(hideBin(process.argv))
  .scriptName('image-sync')
  .command(['daemon', '$0'], 'Sync now, then every schedule.interval_minutes (default)')
  .command('run', 'Run one sync cycle and exit')
  .command('cleanup', 'Delete expired files from downloads/ and processed/')
  .command('ledger', 'Print the fingerprint ledger')
  .option('config', {
    type: 'string',
    default: DEFAULT_CONFIG_FILE,
    describe: 'Path to the JSON configuration file',
  })
  .option('concurrency', {
    type: 'number',
    describe: 'Max items processed at once (defaults to ftp.concurrent_uploads)',
  })
  .option('log-level', {
    type: 'string',
    describe: 'debug | info | warn | error (overrides config and LOG_LEVEL)',
  })
  .option('archive', {
    type: 'boolean',
    default: false,
    describe: 'With cleanup: also sweep the archive',
  })
  .help()
  .strict()
  .parseSync();

function withCliOverrides(config: SyncConfig): SyncConfig {
  const level = argv['log-level'];
  if (!level) return config;
  return { ...config, logging: { ...config.logging, level: parseLogLevel(level, config.logging.level) } };
}

async function main(): Promise<number> {
  const command = String(argv._[0] ?? 'daemon');

  let config: SyncConfig;
  try {
    config = withCliOverrides(loadConfig(argv.config));
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[cli] ${e.message}`);
      return 1;
    }
    throw e;
  }

  const ctx = createSyncContext(config);
  const log = ctx.log.scope('cli');
  const concurrency = typeof argv.concurrency === 'number' && argv.concurrency > 0 ? argv.concurrency : undefined;
  log.info(`start command=${command} config=${argv.config}`);

  if (command === 'cleanup') {
    await cleanupWorking(ctx);
    if (argv.archive) await cleanupArchive(ctx);
    return 0;
  }

  if (command === 'ledger') {
    const store = await FingerprintStore.load(ctx.paths.ledger, log, ctx.now());
    for (const [identity, record] of store.entries()) {
      console.log(`${record.lastSuccessAt.toISOString()}  ${record.contentHash}  ${identity}`);
    }
    log.info(`${store.size} entries in ${ctx.paths.ledger}`);
    return 0;
  }

  const runner = await createSyncRunner(ctx, { concurrency });

  if (command === 'run') {
    const s = await runner.runCycle(config.images);
    log.info(`done succeeded=${s.succeeded} unchanged=${s.unchanged} failed=${s.failed} invalid=${s.invalid} in ${Math.round(s.durationMs / 1000)}s`);
    return 0;
  }

  const scheduler = startScheduler({
    intervalMs: config.schedule.intervalMinutes * 60_000,
    dailyAt: config.schedule.archiveCleanupAt,
    runCycle: () => runner.runCycle(config.images),
    sweepArchive: () => cleanupArchive(ctx),
    log: ctx.log.scope('daemon'),
  });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      log.info(`received ${signal}, stopping`);
      void scheduler.stop().then(resolve);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
  return 0;
}

if (require.main === module) {
  void main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error('[cli] fatal:', e instanceof Error && e.stack ? e.stack : errorMessage(e));
      process.exit(1);
    }
  );
}
