import { describe, test, expect } from 'vitest';
import * as captiondl from '../src';

describe('public API', () => {
  test('exposes the pipeline entry points', () => {
    expect(typeof captiondl.extractVideoId).toBe('function');
    expect(typeof captiondl.resolveChannelId).toBe('function');
    expect(typeof captiondl.listChannelVideos).toBe('function');
    expect(typeof captiondl.fetchTranscript).toBe('function');
    expect(typeof captiondl.exportTranscript).toBe('function');
    expect(typeof captiondl.processVideos).toBe('function');
  });

  test('formats a transcript through the exporter table', () => {
    const segments = [{ text: 'hello', start: 61.5, duration: 2.25 }];

    expect(captiondl.EXPORTERS.txt.format(segments)).toBe('hello\n');
  });
});
