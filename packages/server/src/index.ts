import { CapcodeActivityLog } from './capcodes/activity.js';
import { CapcodeDirectory } from './capcodes/table.js';
import { closeSurface, createHttpSurface, listen, type HttpSurface } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { openDecoderStream, type DecoderStream } from './decoder/source.js';
import { errorMessage } from './errors.js';
import { BroadcastHub } from './hub/service.js';
import { IngestionLoop } from './ingest/service.js';
import { logError, logInfo, logWarn, setVerbose } from './logger.js';
import { RetentionStore } from './store/service.js';

const VERSION = '0.1.0';

const EXIT_STARTUP = 1;
const EXIT_INGESTION_LOST = 2;

function openActivity(path: string): CapcodeActivityLog | null {
  try {
    return new CapcodeActivityLog(path);
  } catch (err) {
    logWarn(`📟 Capcode activity ledger unavailable (${path}): ${errorMessage(err)}`);
    return null;
  }
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logError(`Invalid configuration: ${errorMessage(err)}`);
    process.exit(EXIT_STARTUP);
  }
  setVerbose(config.verbose);

  let capcodes: CapcodeDirectory;
  try {
    capcodes = await CapcodeDirectory.open(config.capcodeFile);
  } catch (err) {
    logError(`📟 ${errorMessage(err)}`);
    process.exit(EXIT_STARTUP);
  }

  const store = new RetentionStore({
    path: config.store.historyFile,
    retentionMs: config.store.retentionMs,
    flushIntervalMs: config.store.flushIntervalMs,
    evictIntervalMs: config.store.evictIntervalMs,
  });
  try {
    await store.load();
  } catch (err) {
    logError(`💾 ${errorMessage(err)}`);
    process.exit(EXIT_STARTUP);
  }
  store.start();

  const hub = new BroadcastHub(store, {
    queueSize: config.hub.queueSize,
    snapshotLimit: config.hub.snapshotLimit,
  });
  const activity = openActivity(config.activityDbPath);
  const ingest = new IngestionLoop({ capcodes, store, hub, activity });

  let decoder: DecoderStream;
  try {
    decoder = await openDecoderStream(config.decoder);
  } catch (err) {
    logError(`📡 ${errorMessage(err)}`);
    await store.close();
    activity?.close();
    process.exit(EXIT_STARTUP);
  }

  const surface: HttpSurface = createHttpSurface({ capcodes, store, hub, ingest, activity, version: VERSION });
  const port = await listen(surface.server, config.http.port, config.http.host);

  const dropReport = setInterval(() => hub.reportDrops(), config.hub.dropReportIntervalMs);
  dropReport.unref();

  let stopping = false;
  const shutdown = async (code: number) => {
    if (stopping) return;
    stopping = true;
    clearInterval(dropReport);
    decoder.stop();
    hub.shutdown();
    const flushed = await store.close();
    if (!flushed) logWarn('💾 Final history flush failed');
    activity?.close();
    try {
      await closeSurface(surface);
    } catch (err) {
      logWarn(`⚡ HTTP shutdown: ${errorMessage(err)}`);
    }
    logInfo(`Stopped (exit ${code})`);
    process.exit(code);
  };

  process.on('SIGHUP', () => {
    capcodes.reload().catch((err: unknown) => {
      logWarn(`📟 Capcode reload failed, keeping previous table: ${errorMessage(err)}`);
    });
  });
  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));

  logInfo(`
  📟 ╔═══════════════════════════════════════╗
  📟 ║            F L E X W A T C H          ║
  📟 ╠═══════════════════════════════════════╣
  📟 ║  HTTP:  http://${config.http.host}:${port}/api
  📟 ║  WS:    ws://${config.http.host}:${port}/ws
  📟 ║  Decoder: ${decoder.description}
  📟 ╚═══════════════════════════════════════╝`);

  try {
    await ingest.run(decoder.stream);
  } catch (err) {
    logError(`📡 Ingestion lost: ${errorMessage(err)}; exiting for the supervisor to restart`);
    await shutdown(EXIT_INGESTION_LOST);
  }
}

main().catch((err: unknown) => {
  logError(`Fatal: ${errorMessage(err)}`, err);
  process.exit(EXIT_STARTUP);
});
