import { Injectable } from '@nestjs/common';
import type { VisionModel } from '../collaborators/collaborator.ports';
import { OllamaService } from '../ollama/ollama.service';

@Injectable()
export class VisionService implements VisionModel {
  constructor(private readonly ollama: OllamaService) {}

  async describe(
    frame: Buffer,
    question: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const description = await this.ollama.generate(
      { model: 'vision', prompt: question, images: [frame.toString('base64')] },
      'vision-model',
      signal,
    );
    return description.trim();
  }
}
