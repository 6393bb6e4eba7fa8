/**
 * Command-line arguments for the bridge
 *
 * Usage:
 *   npx tsx apps/bridge/main.ts <recording.ndjson> [--speed N] [--loop]
 */

export interface CliOptions {
  /** NDJSON recording to replay */
  recording: string | null;
  speed: number;
  loop: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: npx tsx apps/bridge/main.ts <recording.ndjson> [options]

Options:
  --speed, -s <n>   Playback speed multiplier (default: 1)
  --loop, -l        Restart the recording when it ends
  --help, -h        Show this message

Settings are read from HANDLINK_* environment variables (see .env.example).`;

/**
 * @throws UsageError on unknown flags, a bad speed or extra positionals
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { recording: null, speed: 1, loop: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--loop':
      case '-l':
        options.loop = true;
        break;
      case '--speed':
      case '-s': {
        const value = args[i + 1];
        if (value === undefined) {
          throw new UsageError(`${arg} needs a value`);
        }
        options.speed = parseSpeed(value);
        i++;
        break;
      }
      default:
        if (arg.startsWith('--speed=')) {
          options.speed = parseSpeed(arg.slice('--speed='.length));
        } else if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option ${arg}`);
        } else if (options.recording === null) {
          options.recording = arg;
        } else {
          throw new UsageError(`Unexpected argument ${arg}`);
        }
    }
  }

  return options;
}

function parseSpeed(value: string): number {
  const speed = Number(value);
  if (value.trim() === '' || !Number.isFinite(speed) || speed <= 0) {
    throw new UsageError(`Speed must be a positive number, got "${value}"`);
  }
  return speed;
}
