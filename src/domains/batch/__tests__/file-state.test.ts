import { describe, it, expect } from 'vitest';
import { FileTracker, canTransition } from '../file-state';

describe('FileTracker', () => {
  it('walks the success path to archived', () => {
    const tracker = new FileTracker('a.csv');
    tracker.to('processing');
    tracker.to('succeeded');
    tracker.to('archived');

    expect(tracker.state).toBe('archived');
    expect(tracker.path).toEqual(['pending', 'processing', 'succeeded', 'archived']);
    expect(tracker.isTerminal()).toBe(true);
  });

  it('allows an archive failure after a successful write', () => {
    const tracker = new FileTracker('a.csv');
    tracker.to('processing');
    tracker.to('succeeded');
    tracker.to('failed');
    tracker.to('skipped');
    expect(tracker.isTerminal()).toBe(true);
  });

  it('refuses to archive a file that was never processed', () => {
    const tracker = new FileTracker('a.csv');
    expect(() => tracker.to('archived')).toThrow('Illegal transition for a.csv: pending -> archived');
  });

  it('never archives after a failure', () => {
    expect(canTransition('failed', 'archived')).toBe(false);
    expect(canTransition('skipped', 'processing')).toBe(false);
    expect(canTransition('archived', 'processing')).toBe(false);
  });
});
