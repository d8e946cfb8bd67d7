import { afterEach, describe, expect, it, vi } from 'vitest';
import { StreamSession } from '../src/lib/streamSession.js';
import type { FrameSourceLauncher } from '../src/browser/frameSource.js';
import { FakeConnection, FakeFrameSource, fakeLauncher } from './helpers/fakes.js';

const options = {
  viewport: { width: 1280, height: 720 },
  defaultUrlScheme: 'http',
  fps: 5,
  idlePollMs: 500,
  sourceRetryMs: 1000,
};

describe('StreamSession', () => {
  let session: StreamSession | null = null;

  const create = (launcher: FrameSourceLauncher) => {
    session = new StreamSession(launcher, options);
    return session;
  };

  afterEach(async () => {
    await session?.stop();
    session = null;
  });

  it('starts streaming once the primary page is up', async () => {
    const primary = new FakeFrameSource({ url: 'https://example.com/', viewport: { width: 1024, height: 768 } });
    const current = create(fakeLauncher({ primary }));

    await current.start();

    expect(current.status).toBe('running');
    expect(current.streaming).toBe(true);
    expect(current.describe()).toEqual({
      type: 'meta',
      viewport: { width: 1024, height: 768 },
      url: 'https://example.com/',
    });
  });

  it('launches each source only once across repeated starts', async () => {
    const primary = new FakeFrameSource();
    const launcher = fakeLauncher({ primary });
    const launchPrimary = vi.spyOn(launcher, 'launchPrimary');
    const current = create(launcher);

    await Promise.all([current.start(), current.start()]);
    await current.start();

    expect(launchPrimary).toHaveBeenCalledTimes(1);
  });

  it('degrades to no streaming when the primary page cannot be launched', async () => {
    const current = create(fakeLauncher({ primary: new Error('no chromium') }));

    await current.start();

    expect(current.status).toBe('degraded');
    expect(current.streaming).toBe(false);
    expect(current.describe()).toEqual({
      type: 'meta',
      viewport: { width: 1280, height: 720 },
      url: '',
    });

    const viewer = new FakeConnection('v1');
    current.registry.add(viewer);
    current.pipeline.submit({ kind: 'click', xRatio: 0.5, yRatio: 0.5 });
    await current.pipeline.drain();
    expect(viewer.sent).toEqual([]);
  });

  it('keeps streaming when the mirror cannot be launched', async () => {
    const current = create(fakeLauncher({ primary: new FakeFrameSource(), mirror: new Error('no display') }));

    await current.start();

    expect(current.status).toBe('running');
    expect(current.sources.mirrors).toEqual([]);
  });

  it('mirrors input to the visible page when one is launched', async () => {
    const primary = new FakeFrameSource({ label: 'headless' });
    const mirror = new FakeFrameSource({ label: 'visible' });
    const current = create(fakeLauncher({ primary, mirror }));
    await current.start();

    current.pipeline.submit({ kind: 'navigate', url: 'example.net' });
    await current.pipeline.drain();

    expect(primary.calls).toEqual([{ op: 'goto', url: 'http://example.net' }]);
    expect(mirror.calls).toEqual([{ op: 'goto', url: 'http://example.net' }]);
  });

  it('releases every source even when one release fails', async () => {
    const primary = new FakeFrameSource({ label: 'headless' });
    const mirror = new FakeFrameSource({ label: 'visible', failClose: true });
    const current = create(fakeLauncher({ primary, mirror }));
    await current.start();

    await current.stop();

    expect(primary.closed).toBe(true);
    expect(current.status).toBe('stopped');
    expect(current.sources.primary).toBeNull();
    expect(current.sources.mirrors).toEqual([]);
  });

  it('can be stopped without being started, and stopped twice', async () => {
    const primary = new FakeFrameSource();
    const current = create(fakeLauncher({ primary }));

    await current.stop();
    await current.stop();

    expect(current.status).toBe('stopped');
    expect(primary.closed).toBe(false);
  });

  it('releases sources that finish launching after stop', async () => {
    const primary = new FakeFrameSource();
    let launched: (source: FakeFrameSource) => void = () => {};
    const current = create({
      launchPrimary: () => new Promise((resolve) => {
        launched = resolve;
      }),
    });

    const starting = current.start();
    await current.stop();
    launched(primary);
    await starting;

    expect(primary.closed).toBe(true);
    expect(current.status).toBe('stopped');
    expect(current.streaming).toBe(false);
  });
});
