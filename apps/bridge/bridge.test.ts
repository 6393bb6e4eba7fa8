import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'url';
import { clearLog, getLogBuffer, setLogLevel } from '@core/logger';
import { decodeDatagram } from '@wire';
import { Bridge } from './bridge';
import type { BridgeConfig } from './config';
import { FakeSocket } from '../../tests/fakes/fake-socket';

const RECORDING = fileURLToPath(new URL('../../tests/fixtures/short-session.ndjson', import.meta.url));

const settings: BridgeConfig = {
  host: '127.0.0.1',
  port: 5005,
  label: '/tracking/event',
  maxDatagramBytes: 65507,
  fpsWindow: 30,
  logLevel: 'error',
  statusEvery: 0,
};

function bridgeLines(): string[] {
  return getLogBuffer()
    .filter((line) => line.includes('[Bridge]'))
    .map((line) => line.slice(line.indexOf('[Bridge] ') + '[Bridge] '.length));
}

describe('Bridge', () => {
  let socket: FakeSocket;

  beforeEach(() => {
    setLogLevel('error');
    clearLog();
    socket = new FakeSocket();
  });

  it('plays a recording through to the socket and logs the summary', async () => {
    const bridge = new Bridge({ settings, recording: RECORDING, socketFactory: () => socket });

    await bridge.run();

    expect(socket.sent.map((d) => decodeDatagram(d.msg).frame.frameId)).toEqual([101, 102]);
    expect(socket.closeCount).toBe(1);
    expect(bridgeLines()).toEqual([
      `Replaying ${RECORDING} at 1x as /tracking/event to 127.0.0.1:5005`,
      'Total frames: 3',
      'Hands detected in 2 frames (66.7%)',
      'Sent 2, dropped 0, mapping issues 0',
      expect.stringMatching(/^Mean rate: /),
    ]);
  });

  it('releases the socket and logs the summary when the recording cannot be read', async () => {
    const bridge = new Bridge({ settings, recording: RECORDING + '.missing', socketFactory: () => socket });

    await expect(bridge.run()).rejects.toThrow(/ENOENT/);

    expect(socket.closeCount).toBe(1);
    expect(bridgeLines()).toContain('Total frames: 0');
    expect(bridge.getListener().stats().sent).toBe(0);
  });

  it('stops once however often it is asked', async () => {
    const bridge = new Bridge({ settings, recording: RECORDING, socketFactory: () => socket });

    await Promise.all([bridge.stop(), bridge.stop()]);
    await bridge.stop();

    expect(socket.closeCount).toBe(1);
    expect(bridgeLines().filter((line) => line.startsWith('Total frames'))).toHaveLength(1);
  });
});
