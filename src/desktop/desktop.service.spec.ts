import { mkdir } from 'fs/promises';
import { DesktopActionFailedError } from '../common/errors';
import { launchDetached, runProcess } from '../common/process-runner';
import { DEFAULT_ASSISTANT_CONFIG } from '../config/assistant.config';
import { DesktopService } from './desktop.service';

jest.mock('../common/process-runner');
jest.mock('fs/promises', () => ({
  mkdir: jest.fn().mockResolvedValue(undefined),
  readFile: jest.fn().mockRejectedValue(new Error('ENOENT')),
}));

const runProcessMock = jest.mocked(runProcess);
const launchDetachedMock = jest.mocked(launchDetached);
const mkdirMock = jest.mocked(mkdir);

const exited = (code: number) => ({
  code,
  stdout: Buffer.alloc(0),
  stderr: '',
  timedOut: false,
});

const FIREFOX = { name: 'firefox', command: 'firefox', process: 'firefox' };

describe('DesktopService', () => {
  const desktop = new DesktopService({
    ...DEFAULT_ASSISTANT_CONFIG,
    screenshotDir: '/tmp/shots',
  });

  beforeEach(() => {
    runProcessMock.mockReset();
    launchDetachedMock.mockReset();
  });

  describe('closeApp', () => {
    it('kills the process', async () => {
      runProcessMock.mockResolvedValue(exited(0));

      await desktop.closeApp(FIREFOX);

      expect(runProcessMock).toHaveBeenCalledWith('pkill', ['-f', 'firefox'], {
        timeoutMs: DEFAULT_ASSISTANT_CONFIG.collaboratorTimeoutMs,
      });
    });

    it('says when the app is not running', async () => {
      runProcessMock.mockResolvedValue(exited(1));

      await expect(desktop.closeApp(FIREFOX)).rejects.toThrow(
        new DesktopActionFailedError('firefox is not running'),
      );
    });

    it('fails when pkill is missing', async () => {
      runProcessMock.mockRejectedValue(new Error('spawn pkill ENOENT'));

      await expect(desktop.closeApp(FIREFOX)).rejects.toThrow(
        'pkill is not available',
      );
    });
  });

  describe('openWebsite', () => {
    it('launches the browser with the URL', async () => {
      launchDetachedMock.mockResolvedValue(undefined);

      await desktop.openWebsite('https://youtube.com', FIREFOX);

      expect(launchDetachedMock).toHaveBeenCalledWith('firefox', [
        'https://youtube.com',
      ]);
    });

    it('falls back to xdg-open', async () => {
      launchDetachedMock
        .mockRejectedValueOnce(new Error('spawn firefox ENOENT'))
        .mockResolvedValueOnce(undefined);

      await desktop.openWebsite('https://youtube.com', FIREFOX);

      expect(launchDetachedMock).toHaveBeenLastCalledWith('xdg-open', [
        'https://youtube.com',
      ]);
    });
  });

  it('reports an app that cannot be launched', async () => {
    launchDetachedMock.mockRejectedValue(new Error('spawn gedit ENOENT'));

    await expect(
      desktop.openApp({ name: 'text editor', command: 'gedit', process: 'gedit' }),
    ).rejects.toThrow('Could not open text editor');
  });

  it('maps volume directions to amixer arguments', async () => {
    runProcessMock.mockResolvedValue(exited(0));

    await desktop.setVolume('down');

    expect(runProcessMock).toHaveBeenCalledWith(
      'amixer',
      ['set', 'Master', '5%-'],
      expect.anything(),
    );
  });

  it('writes screenshots into the configured directory', async () => {
    runProcessMock.mockResolvedValue(exited(0));

    const path = await desktop.screenshot();

    expect(path).toMatch(/^\/tmp\/shots\/screenshot_\d{8}_\d{6}\.png$/);
    expect(runProcessMock).toHaveBeenCalledWith(
      'gnome-screenshot',
      ['-f', path],
      expect.anything(),
    );
  });

  it('fails the screenshot when the directory cannot be created', async () => {
    mkdirMock.mockRejectedValueOnce(
      new Error("ENOTDIR: not a directory, mkdir '/tmp/shots'"),
    );

    await expect(desktop.screenshot()).rejects.toThrow(
      new DesktopActionFailedError('Could not take screenshot'),
    );
    expect(runProcessMock).not.toHaveBeenCalled();
  });

  it('reports system status without a battery', async () => {
    const status = await desktop.systemStatus();

    expect(status.battery).toBeUndefined();
    expect(status.cpuPercent).toBeGreaterThanOrEqual(0);
    expect(status.memoryPercent).toBeLessThanOrEqual(100);
  });
});
