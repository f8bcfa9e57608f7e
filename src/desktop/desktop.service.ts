import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile } from 'fs/promises';
import { cpus, freemem, homedir, loadavg, totalmem } from 'os';
import { join } from 'path';
import { DesktopActionFailedError } from '../common/errors';
import {
  launchDetached,
  ProcessResult,
  runProcess,
} from '../common/process-runner';
import type {
  Desktop,
  DesktopApp,
  SystemStatus,
} from '../collaborators/collaborator.ports';
import type { VolumeDirection } from '../agent/intent/intent.types';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';

const AMIXER_ARGS: Record<VolumeDirection, string[]> = {
  up: ['set', 'Master', '5%+'],
  down: ['set', 'Master', '5%-'],
  mute: ['set', 'Master', 'toggle'],
};

const BATTERY_DIR = '/sys/class/power_supply/BAT0';

function percent(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value * 10) / 10));
}

/** Linux desktop actions: xdg-open, pkill, gnome-screenshot and amixer. */
@Injectable()
export class DesktopService implements Desktop {
  private readonly logger = new Logger(DesktopService.name);
  private readonly screenshotDir: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.screenshotDir = config.screenshotDir || join(homedir(), 'Pictures');
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  async openApp(app: DesktopApp): Promise<void> {
    try {
      await launchDetached(app.command, []);
    } catch (error) {
      this.logger.error(`Failed to launch ${app.command}`, error);
      throw new DesktopActionFailedError(`Could not open ${app.name}`);
    }
    this.logger.log(`Opened ${app.name}`);
  }

  async closeApp(app: DesktopApp): Promise<void> {
    const result = await this.run('pkill', ['-f', app.process]);
    // pkill exits 1 when no process matched.
    if (result.code === 1) {
      throw new DesktopActionFailedError(`${app.name} is not running`);
    }
    if (result.code !== 0) {
      throw new DesktopActionFailedError(`Could not close ${app.name}`);
    }
    this.logger.log(`Closed ${app.name}`);
  }

  async openWebsite(url: string, browser: DesktopApp): Promise<void> {
    try {
      await launchDetached(browser.command, [url]);
    } catch (error) {
      this.logger.warn(
        `${browser.command} unavailable, falling back to xdg-open: ${error instanceof Error ? error.message : String(error)}`,
      );
      try {
        await launchDetached('xdg-open', [url]);
      } catch {
        throw new DesktopActionFailedError(`Could not open ${url}`);
      }
    }
    this.logger.log(`Opened ${url}`);
  }

  async screenshot(): Promise<string> {
    const stamp = new Date()
      .toISOString()
      .slice(0, 19)
      .replace(/[-:]/g, '')
      .replace('T', '_');
    const path = join(this.screenshotDir, `screenshot_${stamp}.png`);

    try {
      await mkdir(this.screenshotDir, { recursive: true });
    } catch (error) {
      this.logger.error(`Cannot use ${this.screenshotDir}`, error);
      throw new DesktopActionFailedError('Could not take screenshot');
    }
    const result = await this.run('gnome-screenshot', ['-f', path]);
    if (result.code !== 0) {
      throw new DesktopActionFailedError('Could not take screenshot');
    }
    this.logger.log(`Screenshot: ${path}`);
    return path;
  }

  async systemStatus(): Promise<SystemStatus> {
    const [oneMinute] = loadavg();
    const total = totalmem();
    return {
      cpuPercent: percent((oneMinute / Math.max(1, cpus().length)) * 100),
      memoryPercent: percent(((total - freemem()) / total) * 100),
      battery: await this.battery(),
    };
  }

  async setVolume(direction: VolumeDirection): Promise<void> {
    const result = await this.run('amixer', AMIXER_ARGS[direction]);
    if (result.code !== 0) {
      throw new DesktopActionFailedError('Volume command not recognized');
    }
  }

  private async battery(): Promise<SystemStatus['battery']> {
    try {
      const [capacity, status] = await Promise.all([
        readFile(join(BATTERY_DIR, 'capacity'), 'utf8'),
        readFile(join(BATTERY_DIR, 'status'), 'utf8'),
      ]);
      const level = Number.parseInt(capacity.trim(), 10);
      if (Number.isNaN(level)) return undefined;
      return { percent: level, charging: status.trim() === 'Charging' };
    } catch {
      // No battery on this machine.
      return undefined;
    }
  }

  private async run(command: string, args: string[]): Promise<ProcessResult> {
    let result: ProcessResult;
    try {
      result = await runProcess(command, args, { timeoutMs: this.timeoutMs });
    } catch (error) {
      this.logger.error(`${command} could not be started`, error);
      throw new DesktopActionFailedError(`${command} is not available`);
    }
    if (result.timedOut) {
      throw new DesktopActionFailedError(`${command} did not finish in time`);
    }
    return result;
  }
}
