import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  TurnCancelledError,
} from '../common/errors';
import { ProcessResult, runProcess } from '../common/process-runner';
import type { Camera } from '../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';

/** Grabs a single JPEG frame from a V4L2 device through ffmpeg. */
@Injectable()
export class CameraService implements Camera {
  private readonly logger = new Logger(CameraService.name);
  private readonly device: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.device = config.cameraDevice;
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  captureArgs(): string[] {
    // prettier-ignore
    return [
      '-loglevel', 'error',
      '-f', 'v4l2',
      '-video_size', '640x480',
      '-i', this.device,
      '-frames:v', '1',
      '-f', 'image2pipe',
      '-vcodec', 'mjpeg',
      'pipe:1',
    ];
  }

  async capture(signal?: AbortSignal): Promise<Buffer> {
    this.logger.debug(`Capturing frame from ${this.device}`);
    let result: ProcessResult;
    try {
      result = await runProcess('ffmpeg', this.captureArgs(), {
        timeoutMs: this.timeoutMs,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw new TurnCancelledError();
      throw new CollaboratorUnavailableError('camera', { cause: error });
    }

    if (result.timedOut) {
      throw new CollaboratorTimeoutError('camera', this.timeoutMs);
    }
    if (result.code !== 0 || result.stdout.length === 0) {
      throw new CollaboratorUnavailableError('camera', {
        cause: new Error(
          result.stderr.trim() || `ffmpeg exited with ${result.code}`,
        ),
      });
    }
    return result.stdout;
  }
}
