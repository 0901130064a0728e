import './env.js';
import cron from 'node-cron';
import { createApp, type App } from './app.js';
import { loadConfig } from './env.js';
import { StoreUnavailableError } from './errors.js';
import { NonReentrant } from './lock.js';

const config = loadConfig(process.env);

let app: App;
try {
  app = createApp(config);
  console.log(`[Worker] Using DB at ${config.dbPath}`);
} catch (err) {
  if (err instanceof StoreUnavailableError) {
    console.error(`[Worker] ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const pollGuard = new NonReentrant('Poller');
const tickGuard = new NonReentrant('Scheduler');

async function runPoll() {
  try {
    await pollGuard.run(() => app.sync());
  } catch (err) {
    console.error('[Worker] Poll run failed', err);
  }
}

async function runTick() {
  try {
    await tickGuard.run(() => app.scheduler.tick());
  } catch (err) {
    console.error('[Worker] Scheduler tick failed', err);
  }
}

async function runOnce() {
  await runPoll();
  await runTick();
  app.db.close();
}

if (config.runOnce) {
  runOnce().catch(err => {
    console.error('[Worker] Run failed', err);
    process.exitCode = 1;
  });
} else {
  console.log(`[Worker] Polling with cron '${config.pollCron}', ticking with cron '${config.tickCron}', TZ '${config.timezone}'`);
  const tasks = [
    cron.schedule(config.pollCron, runPoll, { timezone: config.timezone }),
    cron.schedule(config.tickCron, runTick, { timezone: config.timezone }),
  ];
  void runPoll();

  // An in-flight poll or tick is abandoned; each store write is atomic per record.
  const shutdown = (signal: string) => {
    console.log(`[Worker] ${signal} received, stopping`);
    for (const task of tasks) task.stop();
    app.db.close();
    process.exit(0);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
