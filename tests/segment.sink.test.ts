import { describe, it, expect, vi } from 'vitest';
import { SegmentAnalyticsSink, createSegmentSink } from '../src/analytics/segment';

describe('SegmentAnalyticsSink', () => {
  it('sends track calls with a string user id', () => {
    const client = { track: vi.fn(), closeAndFlush: vi.fn().mockResolvedValue(undefined) };
    const sink = new SegmentAnalyticsSink(client);

    sink.track(42, 'program.course-enrollment.nudge', { PROGRAM_TYPE: 'XSeries' });

    expect(client.track).toHaveBeenCalledWith({
      userId: '42',
      event: 'program.course-enrollment.nudge',
      properties: { PROGRAM_TYPE: 'XSeries' }
    });
  });

  it('flushes with the configured timeout', async () => {
    const client = { track: vi.fn(), closeAndFlush: vi.fn().mockResolvedValue(undefined) };
    const sink = new SegmentAnalyticsSink(client, 2500);

    await sink.flush();

    expect(client.closeAndFlush).toHaveBeenCalledWith({ timeout: 2500 });
  });

  it('requires a write key', () => {
    expect(() => createSegmentSink('')).toThrow('SEGMENT_WRITE_KEY is required to emit analytics events');
  });
});
