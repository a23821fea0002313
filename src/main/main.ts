import 'reflect-metadata';
import { promises as fs } from 'fs';
import { firstValueFrom } from 'rxjs';
import { loadConfig } from './config';
import { logToFile } from './log';
import { startServer } from './server';
import { createServices } from './services';
import { _dataRoot$, configStore$ } from './state';
import { datasource$ } from './src/data/data-source';
import { kvStore$ } from './src/db';
import { recoverPendingJobs } from './src/workflow/pendingJobRecovery';
import { HOUR } from './src/utils/time';

const CACHE_CLEANUP_INTERVAL = HOUR;

const bootstrap = async () => {
  const config = loadConfig();
  configStore$.next(config);
  await fs.mkdir(config.dataRoot, { recursive: true });
  _dataRoot$.next(config.dataRoot);
  logToFile('data root:', config.dataRoot);

  const [dataSource, store] = await Promise.all([firstValueFrom(datasource$), firstValueFrom(kvStore$)]);
  const services = await createServices(config, dataSource, store);
  services.queue.start();
  services.purchases.start();

  const { recovered, expired } = await recoverPendingJobs(dataSource, services.notes, services.queue, services.now);
  logToFile('pending jobs recovered:', recovered, 'expired:', expired);

  const cleanup = setInterval(() => {
    Promise.all(services.caches.users().map((userId) => services.caches.forUser(userId).cleanupExpiredCache()))
      .catch((e) => logToFile('cache cleanup failed:', e));
  }, CACHE_CLEANUP_INTERVAL);

  const running = await startServer(services, config.port);

  const shutdown = (signal: string) => {
    logToFile('shutting down on', signal);
    clearInterval(cleanup);
    services.queue.stop();
    services.purchases.stop();
    running
      .close()
      .then(() => dataSource.destroy())
      .then(() => process.exit(0))
      .catch((e) => {
        logToFile('shutdown failed:', e);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

bootstrap().catch((e) => {
  logToFile('startup failed:', e);
  process.exitCode = 1;
});
