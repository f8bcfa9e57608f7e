import { Module } from '@nestjs/common';
import { SPEECH_SYNTHESIS } from '../collaborators/collaborator.ports';
import { TtsService } from './tts.service';

@Module({
  providers: [TtsService, { provide: SPEECH_SYNTHESIS, useExisting: TtsService }],
  exports: [SPEECH_SYNTHESIS],
})
export class TtsModule {}
