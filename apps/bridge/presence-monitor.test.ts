import { describe, it, expect, beforeEach } from 'vitest';
import { clearLog, getLogBuffer, setLogLevel } from '@core/logger';
import { mapFrame } from '@mapper';
import { PresenceMonitor, classifyPalmHeight } from './presence-monitor';
import { nativeFrame, nativeHand, v } from '../../tests/fixtures/native-frame';

function frameWithPalmHeight(y: number) {
  const hand = nativeHand();
  hand.palm.position = v(0, y, 0);
  return mapFrame(nativeFrame({ hands: [hand] })).frame;
}

describe('classifyPalmHeight', () => {
  it('uses the 100-400 mm band, inclusive', () => {
    expect(classifyPalmHeight(99.9)).toBe('too-close');
    expect(classifyPalmHeight(100)).toBe('good');
    expect(classifyPalmHeight(400)).toBe('good');
    expect(classifyPalmHeight(400.1)).toBe('too-far');
  });
});

describe('PresenceMonitor', () => {
  beforeEach(() => {
    setLogLevel('error');
    clearLog();
  });

  it('counts frames with and without hands', () => {
    const monitor = new PresenceMonitor();
    monitor.observe(frameWithPalmHeight(200), 1);
    monitor.observe(mapFrame(nativeFrame({ hands: [] })).frame, 2);
    monitor.observe(mapFrame(nativeFrame({ hands: [] })).frame, 3);
    monitor.observe(frameWithPalmHeight(200), 4);

    expect(monitor.summary()).toEqual({
      frames: 4,
      framesWithHands: 2,
      detectionRate: 50,
      lastHandSeenAt: 4,
    });
  });

  it('reports a zero rate before any frame', () => {
    expect(new PresenceMonitor().summary()).toEqual({
      frames: 0,
      framesWithHands: 0,
      detectionRate: 0,
      lastHandSeenAt: null,
    });
  });

  it('returns the placement of each hand', () => {
    const placements = new PresenceMonitor().observe(frameWithPalmHeight(80), 0);
    expect(placements).toEqual([{ handId: 7, isLeft: true, height: 80, placement: 'too-close' }]);
  });

  it('logs only when a hand changes placement', () => {
    const monitor = new PresenceMonitor();
    monitor.observe(frameWithPalmHeight(450), 0);
    monitor.observe(frameWithPalmHeight(460), 1);
    monitor.observe(frameWithPalmHeight(250), 2);

    const lines = getLogBuffer().filter((line) => line.includes('[Presence]'));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/Left hand 7 at 450 mm: too far, move closer \(100-400 mm is best\)$/);
    expect(lines[1]).toMatch(/Left hand 7 at 250 mm: good height$/);
  });
});
