import { Injectable } from '@nestjs/common';
import type {
  ChatMessage,
  ConversationModel,
  ConversationRequest,
} from '../collaborators/collaborator.ports';
import { OllamaService } from '../ollama/ollama.service';

const SPEAKER_LABELS: Record<ChatMessage['role'], string> = {
  user: 'User',
  assistant: 'Assistant',
};

/** Flattens a chat into the single prompt `/api/generate` expects. */
export function buildChatPrompt(history: ChatMessage[], prompt: string): string {
  const lines = history.map(
    (message) => `${SPEAKER_LABELS[message.role]}: ${message.content}`,
  );
  lines.push(`${SPEAKER_LABELS.user}: ${prompt}`);
  return `${lines.join('\n')}\n${SPEAKER_LABELS.assistant}: `;
}

@Injectable()
export class LlmService implements ConversationModel {
  constructor(private readonly ollama: OllamaService) {}

  async reply(
    request: ConversationRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    const answer = await this.ollama.generate(
      {
        model: 'text',
        system: request.system,
        prompt: buildChatPrompt(request.history, request.prompt),
      },
      'conversation-model',
      signal,
    );
    return answer.trim();
  }
}
