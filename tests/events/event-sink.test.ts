import { describe, it, expect, vi } from 'vitest';
import { Writable } from 'node:stream';
import {
  CollectingEventSink,
  CompositeEventSink,
  JsonlEventSink,
  NullEventSink,
  type AgentEvent,
} from '../../src/events/event-sink.js';

const start: AgentEvent = { type: 'run_start', runId: 'run-1', task: 'Find a shirt', maxSteps: 5 };
const stuck: AgentEvent = { type: 'stuck', runId: 'run-1', stepNumber: 4, action: 'scroll_down', repeats: 3 };

describe('CollectingEventSink', () => {
  it('filters events by type', () => {
    const sink = new CollectingEventSink();
    sink.emit(start);
    sink.emit(stuck);

    expect(sink.events).toEqual([start, stuck]);
    expect(sink.ofType('stuck')).toEqual([stuck]);
    expect(sink.ofType('run_error')).toEqual([]);
  });
});

describe('CompositeEventSink', () => {
  it('forwards every event to each sink in order', async () => {
    const order: string[] = [];
    const first = { emit: vi.fn(async () => void order.push('first')) };
    const second = { emit: vi.fn(() => void order.push('second')) };
    const sink = new CompositeEventSink([first, new NullEventSink(), second]);

    await sink.emit(start);

    expect(first.emit).toHaveBeenCalledWith(start);
    expect(second.emit).toHaveBeenCalledWith(start);
    expect(order).toEqual(['first', 'second']);
  });

  it('fails when a sink fails', async () => {
    const sink = new CompositeEventSink([
      {
        emit: () => {
          throw new Error('disk full');
        },
      },
    ]);

    await expect(sink.emit(start)).rejects.toThrow('disk full');
  });
});

describe('JsonlEventSink', () => {
  it('writes one timestamped JSON object per line', async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
    const sink = new JsonlEventSink(out, () => new Date('2026-01-01T00:00:00.000Z'));

    sink.emit(start);
    sink.emit(stuck);
    await new Promise((resolve) => setImmediate(resolve));

    expect(chunks.join('')).toBe(
      '{"timestamp":"2026-01-01T00:00:00.000Z","type":"run_start","runId":"run-1","task":"Find a shirt","maxSteps":5}\n' +
        '{"timestamp":"2026-01-01T00:00:00.000Z","type":"stuck","runId":"run-1","stepNumber":4,"action":"scroll_down","repeats":3}\n',
    );
  });
});
