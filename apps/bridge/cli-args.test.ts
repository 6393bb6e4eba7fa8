import { describe, it, expect } from 'vitest';
import { parseCliArgs, UsageError } from './cli-args';

describe('parseCliArgs', () => {
  it('defaults to real-time playback without looping', () => {
    expect(parseCliArgs(['session.ndjson'])).toEqual({
      recording: 'session.ndjson',
      speed: 1,
      loop: false,
      help: false,
    });
  });

  it('reads speed and loop flags in any order', () => {
    expect(parseCliArgs(['--loop', '-s', '2.5', 'a.ndjson'])).toEqual({
      recording: 'a.ndjson',
      speed: 2.5,
      loop: true,
      help: false,
    });
    expect(parseCliArgs(['a.ndjson', '--speed=0.5']).speed).toBe(0.5);
  });

  it('leaves the recording unset when only flags are given', () => {
    expect(parseCliArgs(['--help'])).toEqual({ recording: null, speed: 1, loop: false, help: true });
  });

  it('rejects a missing or non-positive speed', () => {
    expect(() => parseCliArgs(['a.ndjson', '--speed'])).toThrow('--speed needs a value');
    expect(() => parseCliArgs(['a.ndjson', '--speed', '0'])).toThrow('Speed must be a positive number, got "0"');
    expect(() => parseCliArgs(['a.ndjson', '--speed=fast'])).toThrow(UsageError);
  });

  it('rejects unknown options and extra arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option --verbose');
    expect(() => parseCliArgs(['a.ndjson', 'b.ndjson'])).toThrow('Unexpected argument b.ndjson');
  });
});
