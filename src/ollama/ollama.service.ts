import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsBoolean, IsOptional, IsString } from 'class-validator';
import { callCollaborator, readJson } from '../common/collaborator-http';
import type { CollaboratorName } from '../common/errors';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';

export class OllamaGenerateResponseDto {
  @IsOptional()
  @IsString()
  model?: string;

  @IsString()
  response!: string;

  @IsOptional()
  @IsBoolean()
  done?: boolean;
}

export type OllamaModelKind = 'text' | 'vision';

export interface OllamaGenerateRequest {
  model: OllamaModelKind;
  prompt: string;
  system?: string;
  /** Base64-encoded images, vision model only. */
  images?: string[];
}

@Injectable()
export class OllamaService {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly llmModel: string;
  private readonly visionModel: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.baseUrl = config.ollamaBaseUrl.replace(/\/+$/, '');
    this.llmModel = config.ollamaLlmModel;
    this.visionModel = config.ollamaVisionModel;
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  private resolveModel(kind: OllamaModelKind): string {
    switch (kind) {
      case 'text':
        return this.llmModel;
      case 'vision':
        return this.visionModel;
    }
  }

  async generate(
    request: OllamaGenerateRequest,
    collaborator: CollaboratorName,
    signal?: AbortSignal,
  ): Promise<string> {
    const modelName = this.resolveModel(request.model);
    const url = `${this.baseUrl}/api/generate`;
    this.logger.debug(
      `Calling Ollama generate (${request.model}=${modelName}): ${url}`,
    );

    try {
      const res = await callCollaborator(
        collaborator,
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: modelName,
            prompt: request.prompt,
            system: request.system,
            images: request.images,
            stream: false,
          }),
        },
        { timeoutMs: this.timeoutMs, signal },
      );
      const json = await readJson(collaborator, res, OllamaGenerateResponseDto);
      return json.response;
    } catch (error) {
      this.logger.error(`Ollama generate(${request.model}) error`, error);
      throw error;
    }
  }
}
