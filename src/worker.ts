import { loadEnvFiles } from './env.js';
import { type Config, type LoadedConfig, loadConfig, scheduleExpression } from './config.js';
import { ConfigError } from './errors.js';
import { createHealthServer, startHealthServer } from './health.js';
import { type Logger, createBootstrapLogger, createLogger } from './logger.js';
import { createTargets, runFailed, runPipeline } from './pipeline.js';
import { CronTrigger, Scheduler, SignalTrigger, StartupTrigger, type TriggerSource } from './scheduler.js';

async function runOnce(config: Config, log: Logger): Promise<number> {
  const report = await runPipeline(config, { log: log.child({ module: 'pipeline' }), targets: createTargets(config) });
  return runFailed(report, config.calendars.length) ? 1 : 0;
}

async function serve(config: Config, log: Logger): Promise<void> {
  const targets = createTargets(config);
  const expression = scheduleExpression(config.schedule);

  const sources: TriggerSource[] = [];
  if (config.schedule.runOnStartup) sources.push(new StartupTrigger());
  sources.push(new CronTrigger(expression, config.timezone), new SignalTrigger('SIGUSR1'));

  const pipelineLog = log.child({ module: 'pipeline' });
  const scheduler = new Scheduler({
    job: () => runPipeline(config, { log: pipelineLog, targets }),
    sources,
    log: log.child({ module: 'scheduler' }),
  });
  const health = createHealthServer(() => scheduler.status());
  const address = await startHealthServer(health, config.healthPort);
  log.info({ address }, 'Health endpoint listening');

  log.info(
    { cron: expression, timezone: config.timezone, nextRunAt: scheduler.nextRunAt()?.toISOString() ?? null },
    'Scheduling digest',
  );
  scheduler.start();

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info({ signal, state: scheduler.state }, 'Shutting down');
    scheduler.stop();
    await scheduler.whenIdle();
    await health.close();
    log.info('Stopped');
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

async function main(): Promise<void> {
  const boot = createBootstrapLogger();
  const envFiles = loadEnvFiles();

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    boot.fatal({ issues: err.issues }, 'Invalid configuration');
    process.exitCode = 1;
    return;
  }

  const { config, warnings } = loaded;
  const log = createLogger(config.log);
  log.info(
    {
      envFiles,
      calendars: config.calendars.length,
      discord: config.discord.enabled,
      slack: config.slack.enabled,
      timezone: config.timezone,
    },
    'Configuration loaded',
  );
  for (const warning of warnings) log.warn(warning);

  if (config.schedule.runOnce) {
    process.exitCode = await runOnce(config, log);
    return;
  }
  await serve(config, log);
}

main().catch((err: unknown) => {
  createBootstrapLogger().fatal({ err }, 'Worker crashed');
  process.exitCode = 1;
});
