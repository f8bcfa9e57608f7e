import { Inject, Injectable, Logger } from '@nestjs/common';
import { callCollaborator } from '../common/collaborator-http';
import type { SpeechSynthesis } from '../collaborators/collaborator.ports';
import { ASSISTANT_CONFIG, AssistantConfig } from '../config/assistant.config';
import type { Language } from '../language/language.types';

/** Posts text to the TTS server, which plays it back itself. */
@Injectable()
export class TtsService implements SpeechSynthesis {
  private readonly logger = new Logger(TtsService.name);
  private readonly ttsServerUrl: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ASSISTANT_CONFIG) config: AssistantConfig) {
    this.ttsServerUrl = config.ttsServerUrl.replace(/\/+$/, '');
    this.timeoutMs = config.collaboratorTimeoutMs;
  }

  async speak(text: string, language: Language): Promise<void> {
    if (!text.trim()) return;
    this.logger.debug(`Speaking ${text.length} chars (${language})`);
    await callCollaborator(
      'speech-synthesis',
      `${this.ttsServerUrl}/speak`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text, language }),
      },
      { timeoutMs: this.timeoutMs },
    );
  }
}
