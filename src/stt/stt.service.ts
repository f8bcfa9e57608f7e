import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsOptional, IsString } from 'class-validator';
import { readFile, unlink } from 'fs/promises';
import { basename, resolve } from 'path';
import { callCollaborator, readJson } from '../common/collaborator-http';
import { CollaboratorUnavailableError } from '../common/errors';
import type {
  SpeechToText,
  Transcript,
} from '../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';

export class TranscriptionResponseDto {
  @IsString()
  text!: string;

  @IsOptional()
  @IsString()
  language?: string;
}

@Injectable()
export class SttService implements SpeechToText {
  private readonly logger = new Logger(SttService.name);
  private readonly sttServerUrl: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.sttServerUrl = config.sttServerUrl.replace(/\/+$/, '');
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  async transcribe(
    audioPath: string,
    signal?: AbortSignal,
  ): Promise<Transcript> {
    const absAudio = resolve(audioPath);

    try {
      let fileBuffer: Buffer;
      try {
        fileBuffer = await readFile(absAudio);
      } catch (error) {
        throw new CollaboratorUnavailableError('speech-to-text', {
          cause: error,
        });
      }
      const form = new FormData();
      form.append('audio', new Blob([fileBuffer]), basename(absAudio));

      this.logger.debug(`Sending audio to STT server: ${this.sttServerUrl}`);

      const resp = await callCollaborator(
        'speech-to-text',
        `${this.sttServerUrl}/transcribe`,
        { method: 'POST', body: form },
        { timeoutMs: this.timeoutMs, signal },
      );
      const { text, language } = await readJson(
        'speech-to-text',
        resp,
        TranscriptionResponseDto,
      );
      return language ? { text: text.trim(), language } : { text: text.trim() };
    } finally {
      await unlink(absAudio).catch((error: unknown) =>
        this.logger.warn(
          `Could not remove ${absAudio}: ${error instanceof Error ? error.message : String(error)}`,
        ),
      );
    }
  }
}
