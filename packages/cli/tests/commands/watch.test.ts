import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli } from '../../src/cli.js';
import { WatchSession } from '../../src/commands/watch.js';
import { DEFAULT_SETTINGS } from '../../src/settings.js';
import { createTestContext } from '../helpers/fake-context.js';

describe('watch', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('watches the directory for .up files until interrupted', async () => {
    const context = createTestContext();

    const running = runCli(['watch', 'src', '--out', 'out'], context);
    await vi.waitFor(() => expect(context.watchers[0]?.started).toBe(true));

    const [watcher] = context.watchers;
    expect(watcher.dir).toBe('/work/src');
    expect(watcher.options).toEqual({ extensions: ['.up'] });

    context.interrupt();
    expect(await running).toBe(0);
    expect(watcher.stopped).toBe(true);
  });

  it('refuses to write .up output into the watched directory', async () => {
    const context = createTestContext();

    expect(await runCli(['watch', 'src', '--out', './src/', '--to', 'up'], context)).toBe(2);
    expect(context.stderrText()).toBe(
      "error: watch output directory must differ from /work/src when writing .up files\n" +
        "Run 'uplang --help' for usage.\n",
    );
    expect(context.watchers).toHaveLength(0);
  });

  it('allows json output beside the watched sources', async () => {
    const context = createTestContext();

    const running = runCli(['watch', 'src', '--out', 'src'], context);
    await vi.waitFor(() => expect(context.watchers[0]?.started).toBe(true));

    context.interrupt();
    expect(await running).toBe(0);
  });

  describe('WatchSession', () => {
    function startSession(format: 'json' | 'up' = 'json') {
      const context = createTestContext();
      const session = new WatchSession('/work/src', '/work/out', { ...DEFAULT_SETTINGS, format }, context);
      const [watcher] = context.watchers;
      return { context, session, watcher };
    }

    it('converts changed files into the output directory', async () => {
      const { context, watcher } = startSession();

      await watcher.change('/work/src/app.up', 'a 1\n', 100);

      expect(context.fileSystem.text('/work/out/app.json')).toBe('{\n  "a": "1"\n}\n');
    });

    it('skips files that have not changed since the last conversion', async () => {
      const { context, watcher } = startSession();

      await watcher.change('/work/src/app.up', 'a 1\n', 100);
      await watcher.change('/work/src/app.up', 'a 2\n', 100);

      expect(context.fileSystem.text('/work/out/app.json')).toBe('{\n  "a": "1"\n}\n');
      expect(console.log).toHaveBeenCalledWith('[uplang:Convert] Skipped (up-to-date): app.up');
    });

    it('reconverts when the file changes again', async () => {
      const { context, watcher } = startSession('up');

      await watcher.change('/work/src/app.up', 'a 1\n', 100);
      await watcher.change('/work/src/app.up', 'a    2\n', 200);

      expect(context.fileSystem.text('/work/out/app.up')).toBe('a    2\n');
    });

    it('logs conversion failures and keeps watching', async () => {
      const { context, watcher } = startSession();

      await watcher.change('/work/src/bad.up', 'a {\n', 100);
      await watcher.change('/work/src/good.up', 'b 1\n', 100);

      expect(warnSpy).toHaveBeenCalledWith('[uplang:Watch] /work/src/bad.up:1: unterminated block');
      expect(context.fileSystem.files.has('/work/out/bad.json')).toBe(false);
      expect(context.fileSystem.text('/work/out/good.json')).toBe('{\n  "b": "1"\n}\n');
    });

    it('retries a failed file at the same mtime', async () => {
      const { context, watcher } = startSession();

      await watcher.change('/work/src/app.up', 'a {\n', 100);
      await watcher.change('/work/src/app.up', 'a 1\n', 100);

      expect(context.fileSystem.text('/work/out/app.json')).toBe('{\n  "a": "1"\n}\n');
    });

    it('removes the output when the source is deleted', async () => {
      const { context, watcher } = startSession();

      await watcher.change('/work/src/app.up', 'a 1\n', 100);
      await watcher.remove('/work/src/app.up');

      expect(context.fileSystem.files.has('/work/out/app.json')).toBe(false);

      await watcher.change('/work/src/app.up', 'a 1\n', 100);
      expect(context.fileSystem.text('/work/out/app.json')).toBe('{\n  "a": "1"\n}\n');
    });
  });
});
