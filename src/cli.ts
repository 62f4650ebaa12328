#!/usr/bin/env node
import { BpftoolBackend } from './backends/bpftool';
import { loadConfig } from './config';
import { CounterSource } from './counter-source';
import { ConfigurationError, ExitCode, StatsError } from './errors';
import { StatsPoller } from './poller';
import { Reporter } from './reporter';
import { SnapshotStore } from './snapshot-store';
import { logger } from './utils/logger';
import { watchOutput } from './utils/output';

async function main(): Promise<ExitCode> {
  const config = loadConfig();

  const backend = new BpftoolBackend({
    bin: config.bpftool,
    pinDir: config.pinDir,
    timeoutMs: config.timeoutMs,
  });
  await backend.verify();

  const cpus = backend.possibleCpus();
  const source = new CounterSource(backend, cpus);
  const store = new SnapshotStore(source, { cpus, targets: config.targets });
  const poller = new StatsPoller(store, new Reporter(process.stdout));

  // Handlers only request the stop; the loop unwinds on its own
  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping...`);
    poller.cancel();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
  watchOutput(process.stdout, () => poller.cancel());

  await poller.start(config.intervalSeconds);
  return ExitCode.OK;
}

main().then(
  code => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      logger.error(`❌ ${err.message}`);
      err.issues.forEach(issue => logger.error(`  - ${issue}`));
      process.exit(err.exitCode);
    }
    if (err instanceof StatsError) {
      logger.error(err.message);
      process.exit(err.exitCode);
    }
    logger.error('Unexpected failure', err);
    process.exit(ExitCode.FAIL);
  }
);
