import { Module } from '@nestjs/common';
import { CONVERSATION_MODEL } from '../collaborators/collaborator.ports';
import { OllamaModule } from '../ollama/ollama.module';
import { LlmService } from './llm.service';

@Module({
  imports: [OllamaModule],
  providers: [
    LlmService,
    { provide: CONVERSATION_MODEL, useExisting: LlmService },
  ],
  exports: [CONVERSATION_MODEL],
})
export class LlmModule {}
