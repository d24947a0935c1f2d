import { describeOutcome } from '../core/coordinator';
import { createStdoutLogger } from '../core/log';
import { DockerClusterRuntime } from '../platform/node/dockerClusterRuntime';
import { HttpDataService } from '../platform/node/httpDataService';
import { readConfig } from './config';
import { runUpgradeJourney } from './upgradeJourney';

function printUsage(): void {
  process.stdout.write(
    [
      'Usage: npm run journey -- [options]',
      '',
      'Options:',
      '  --versions <a,b,c>     ordered upgrade path (default: 1.16.0..1.17.2)',
      '  --cluster-size <n>     (default: 3)',
      '  --endpoint <url>       data endpoint (default: http://localhost:<base-port>)',
      '  --image <name>         container image without tag (default: semitechnologies/weaviate)',
      '  --prefix <name>        container/network name prefix (default: upgrade-journey)',
      '  --base-port <port>     host port of node 0 (default: 8080)',
      '  --keep-cluster         leave containers running after the run',
      '',
      'Environment:',
      '  UPGRADE_VERSIONS, CLUSTER_SIZE, SERVICE_ENDPOINT, SERVICE_IMAGE, CLUSTER_PREFIX,',
      '  SERVICE_BASE_PORT, READY_POLL_INTERVAL_MS, READY_MAX_ATTEMPTS, READY_TIMEOUT_S,',
      '  VISIBILITY_POLL_INTERVAL_MS, VISIBILITY_MAX_ATTEMPTS, REQUEST_TIMEOUT_MS, KEEP_CLUSTER',
    ].join('\n') + '\n',
  );
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help')) {
    printUsage();
    return;
  }

  const config = readConfig(argv, process.env);
  const log = createStdoutLogger();
  const runtime = new DockerClusterRuntime({
    image: config.image,
    prefix: config.prefix,
    basePort: config.basePort,
    requestTimeoutMs: config.requestTimeoutMs,
    log,
  });
  const data = new HttpDataService(config.endpoint, fetch, config.requestTimeoutMs);

  const { outcome, teardownFailures } = await runUpgradeJourney(config, { runtime, data, log });
  if (outcome.status === 'failed') {
    process.stderr.write(`${describeOutcome(outcome)}\n`);
    process.exitCode = 1;
    return;
  }
  if (teardownFailures.length > 0) {
    log(`Run passed; ${teardownFailures.length} teardown step(s) failed`);
  }
}

main().catch((error) => {
  const message = error instanceof Error ? `${error.message}\n${error.stack ?? ''}` : String(error);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
