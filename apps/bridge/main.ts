#!/usr/bin/env npx tsx
/**
 * Bridge entry point
 *
 * Replays a recorded session through the tracking listener and streams
 * every frame after the first to the configured UDP destination.
 *
 * Usage:
 *   npx tsx apps/bridge/main.ts <recording.ndjson> [--speed N] [--loop]
 */

import { config as loadDotenv } from 'dotenv';
import { createLogger, setLogLevel } from '@core/logger';
import { Bridge } from './bridge';
import { loadConfig } from './config';
import { parseCliArgs, USAGE } from './cli-args';

const log = createLogger('Bridge');

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help || options.recording === null) {
    console.log(USAGE);
    process.exit(options.help ? 0 : 1);
  }

  loadDotenv();
  const settings = loadConfig(process.env);
  setLogLevel(settings.logLevel);

  const bridge = new Bridge({
    settings,
    recording: options.recording,
    speed: options.speed,
    loop: options.loop,
  });

  const stopAndExit = () => {
    bridge.stop().then(() => process.exit(0), (e) => {
      console.error('Shutdown failed:', e);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => {
    log.info('Interrupted, stopping');
    stopAndExit();
  });
  process.on('SIGTERM', stopAndExit);

  await bridge.run();
}

main().catch(e => {
  console.error('Bridge failed:', e instanceof Error ? e.message : e);
  process.exit(1);
});
