import { describe, it, expect, vi } from 'vitest';
import { EventBusProgressNotifier, type ProgressListener } from '@/notifications/event-bus.js';
import type { AnalysisCompletedPayload } from '@/types/index.js';

const PAYLOAD: AnalysisCompletedPayload = {
  analysisId: 'a1',
  fileName: 'events.jsonl',
  fileHash: 'abc',
  status: 'completed',
  threatScore: 75,
  severity: 'high',
  completionTime: '2024-03-01T12:00:00.000Z',
  ruleMatchCount: 1,
};

describe('EventBusProgressNotifier', () => {
  it('should deliver progress only to subscribers of that analysis', () => {
    const bus = new EventBusProgressNotifier();
    const mine = vi.fn();
    const other = vi.fn();
    bus.subscribe('a1', mine);
    bus.subscribe('a2', other);

    bus.progress('a1', 30, 'Parsed 3 events');

    expect(mine).toHaveBeenCalledWith({ analysisId: 'a1', percent: 30, message: 'Parsed 3 events' });
    expect(other).not.toHaveBeenCalled();
  });

  it('should deliver every analysis to global progress listeners', () => {
    const bus = new EventBusProgressNotifier();
    const listener = vi.fn<ProgressListener>();
    bus.onProgress(listener);

    bus.progress('a1', 5, 'Found 1 file(s)');
    bus.progress('a2', 10, 'File loaded: b.jsonl');

    expect(listener.mock.calls.map(([event]) => event.analysisId)).toEqual(['a1', 'a2']);
  });

  it('should stop delivering after unsubscribe', () => {
    const bus = new EventBusProgressNotifier();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe('a1', listener);

    bus.progress('a1', 5, 'Found 1 file(s)');
    unsubscribe();
    bus.progress('a1', 10, 'File loaded: events.jsonl');

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should broadcast completion payloads', () => {
    const bus = new EventBusProgressNotifier();
    const listener = vi.fn();
    const unsubscribe = bus.onCompleted(listener);

    bus.completed(PAYLOAD);
    unsubscribe();
    bus.completed(PAYLOAD);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(PAYLOAD);
  });
});
