import { describe, it, expect, vi, afterEach } from 'vitest';
import { Runtime } from '../runtime';
import { BatchCoordinator } from '../domains/batch/coordinator';
import type { FileArchiver, FileProcessor } from '../shared/contracts';
import { captureLogger, makeTempDir } from '../test-support/fixtures';

async function idleCoordinator() {
  const dir = await makeTempDir();
  const processor: FileProcessor = {
    process: async () => ({ ok: false, failure: { kind: 'ingest', message: 'unused' } }),
  };
  const archiver: FileArchiver = { archive: async (file) => file };
  return new BatchCoordinator(processor, archiver, {
    paths: { bronzeRoot: dir, silverRoot: dir },
    logger: captureLogger(),
  });
}

describe('Runtime', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs one batch per call to runOnce', async () => {
    const coordinator = await idleCoordinator();
    const run = vi.spyOn(coordinator, 'run');
    const runtime = new Runtime(coordinator, null, captureLogger());

    await runtime.runOnce();
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while the previous one is still running', async () => {
    const coordinator = await idleCoordinator();
    let release: () => void = () => undefined;
    vi.spyOn(coordinator, 'run').mockImplementation(
      () =>
        new Promise((resolve) => {
          release = () =>
            resolve({
              id: 'r1',
              mode: 'batch',
              started_at: new Date(0),
              finished_at: new Date(0),
              discovered: 0,
              archived: 0,
              skipped: 0,
              files: [],
            });
        })
    );
    const runtime = new Runtime(coordinator, null, captureLogger());

    const first = runtime.tick();
    expect(await runtime.tick()).toBe(false);
    release();
    expect(await first).toBe(true);
  });

  it('does nothing on start when the interval is zero', async () => {
    const coordinator = await idleCoordinator();
    vi.useFakeTimers();
    const run = vi.spyOn(coordinator, 'run');
    const runtime = new Runtime(coordinator, null, captureLogger());

    runtime.start(0);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(run).not.toHaveBeenCalled();
  });

  it('runs on the interval until stopped', async () => {
    const coordinator = await idleCoordinator();
    vi.useFakeTimers();
    const run = vi.spyOn(coordinator, 'run').mockResolvedValue({
      id: 'r1',
      mode: 'batch',
      started_at: new Date(0),
      finished_at: new Date(0),
      discovered: 0,
      archived: 0,
      skipped: 0,
      files: [],
    });
    const runtime = new Runtime(coordinator, null, captureLogger());

    runtime.start(1_000);
    await vi.advanceTimersByTimeAsync(3_500);
    runtime.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(run).toHaveBeenCalledTimes(3);
  });
});
