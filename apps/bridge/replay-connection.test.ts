import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { clearLog, getLogBuffer, setLogLevel } from '@core/logger';
import type { DeviceInfo, TrackingEventListener } from '@core/types';
import { DatagramDispatcher } from '@transport';
import { decodeDatagram } from '@wire';
import { ReplayConnection, frameGapMs, parseRecording } from './replay-connection';
import { TrackingListener } from './tracking-listener';
import { FakeSocket } from '../../tests/fakes/fake-socket';

const RECORDING = fileURLToPath(new URL('../../tests/fixtures/short-session.ndjson', import.meta.url));

// ===== Test Utilities =====

class EventLog implements TrackingEventListener {
  readonly events: string[] = [];
  readonly frames: unknown[] = [];
  readonly errors: Error[] = [];

  onConnection(): void {
    this.events.push('connection');
  }

  onDevice(info: DeviceInfo): void {
    this.events.push(`device:${info.serial}`);
  }

  onTracking(frame: unknown): void {
    this.events.push('tracking');
    this.frames.push(frame);
  }

  onConnectionLost(reason: string): void {
    this.events.push(`lost:${reason}`);
  }

  onError(error: Error): void {
    this.events.push('error');
    this.errors.push(error);
  }
}

// ===== Tests =====

describe('parseRecording', () => {
  it('parses one frame per line and reports bad lines', () => {
    const { frames, errors } = parseRecording('{"a":1}\n\nnope\r\n{"b":2}\n');
    expect(frames).toEqual([{ a: 1 }, { b: 2 }]);
    expect(errors).toHaveLength(1);
    expect(errors[0].line).toBe(3);
  });
});

describe('frameGapMs', () => {
  it('converts the sensor timestamp gap to milliseconds', () => {
    expect(frameGapMs({ timestamp: 1_000_000 }, { timestamp: 1_020_000 }, 5)).toBe(20);
  });

  it('falls back when timestamps are missing or go backwards', () => {
    expect(frameGapMs({}, { timestamp: 1 }, 5)).toBe(5);
    expect(frameGapMs({ timestamp: 10 }, { timestamp: 1 }, 5)).toBe(5);
  });
});

describe('ReplayConnection', () => {
  beforeEach(() => {
    setLogLevel('error');
    clearLog();
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('announces the connection and device, then plays frames at the recorded pace', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING, serial: 'REC-1' });
    connection.addListener(log);

    await connection.open();
    expect(log.events).toEqual(['connection', 'device:REC-1']);
    expect(getLogBuffer().filter((line) => line.includes('[Replay] Line'))).toHaveLength(1);
    expect(getLogBuffer().some((line) => line.includes('WARN [Replay] Line 3 skipped:'))).toBe(true);

    vi.advanceTimersByTime(0);
    expect(log.frames).toHaveLength(1);

    // next frame is 11.111 ms later
    vi.advanceTimersByTime(10);
    expect(log.frames).toHaveLength(1);
    vi.advanceTimersByTime(2);
    expect(log.frames).toHaveLength(2);

    vi.advanceTimersByTime(12);
    expect(log.frames).toHaveLength(3);
    expect(log.events.at(-1)).toBe('lost:end of recording');
    await expect(connection.whenDone()).resolves.toBeUndefined();
  });

  it('scales the pace by speed', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING, speed: 2 });
    connection.addListener(log);
    await connection.open();

    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(6);
    expect(log.frames).toHaveLength(2);
    connection.close();
  });

  it('loops back to the first frame', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING, loop: true, fallbackIntervalMs: 10 });
    connection.addListener(log);
    await connection.open();

    vi.advanceTimersByTime(0 + 12 + 12 + 10);
    expect(log.frames).toHaveLength(4);
    expect(log.frames[3]).toEqual(log.frames[0]);

    connection.close();
    vi.advanceTimersByTime(1000);
    expect(log.frames).toHaveLength(4);
  });

  it('stops delivering frames once closed', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING });
    connection.addListener(log);
    await connection.open();

    vi.advanceTimersByTime(0);
    connection.close();
    vi.advanceTimersByTime(1000);

    expect(log.frames).toHaveLength(1);
    expect(connection.position()).toBe(1);
    await expect(connection.whenDone()).resolves.toBeUndefined();
  });

  it('stays silent when closed while the recording is loading', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING });
    connection.addListener(log);

    const opening = connection.open();
    connection.close();
    await opening;
    vi.advanceTimersByTime(1000);

    expect(log.events).toEqual([]);
    expect(connection.position()).toBe(0);
    await expect(connection.whenDone()).resolves.toBeUndefined();
  });

  it('reports a recording that cannot be read', async () => {
    const log = new EventLog();
    const connection = new ReplayConnection({ path: RECORDING + '.missing' });
    connection.addListener(log);

    await expect(connection.open()).rejects.toThrow(/ENOENT/);
    expect(log.events).toEqual(['error']);
  });

  it('routes a listener exception to its onError', async () => {
    const log = new EventLog();
    const throwing: TrackingEventListener = {
      onConnection: () => log.onConnection(),
      onDevice: (info) => log.onDevice(info),
      onTracking: () => {
        throw new Error('listener failed');
      },
      onConnectionLost: (reason) => log.onConnectionLost(reason),
      onError: (error) => log.onError(error),
    };
    const connection = new ReplayConnection({ path: RECORDING });
    connection.addListener(throwing);
    await connection.open();

    vi.advanceTimersByTime(0);
    expect(log.errors.map((e) => e.message)).toEqual(['listener failed']);
    connection.close();
  });

  it('rejects a non-positive speed', () => {
    expect(() => new ReplayConnection({ path: RECORDING, speed: 0 })).toThrow(RangeError);
  });

  it('drives the tracking listener end to end', async () => {
    const socket = new FakeSocket();
    const dispatcher = new DatagramDispatcher({ host: '127.0.0.1', port: 5005, socketFactory: () => socket });
    const listener = new TrackingListener({ dispatcher });
    const connection = new ReplayConnection({ path: RECORDING });
    connection.addListener(listener);

    await connection.open();
    vi.advanceTimersByTime(100);
    await connection.whenDone();
    await listener.shutdown();

    const frames = socket.sent.map((d) => decodeDatagram(d.msg).frame);
    expect(frames.map((f) => f.frameId)).toEqual([101, 102]);
    expect(frames[0].hands).toEqual([]);
    expect(frames[1].hands[0].isLeft).toBe(false);
    expect(frames[1].hands[0].palmPosition).toEqual({ x: 0, y: 182.5, z: 0 });
    expect(frames[1].hands[0].wristPosition).toEqual({ x: 0, y: 0, z: 0 });
    expect(socket.closeCount).toBe(1);
    expect(listener.getState()).toBe('tracking');
  });
});
