import { Module } from '@nestjs/common';
import { SPEECH_TO_TEXT } from '../collaborators/collaborator.ports';
import { SttController } from './stt.controller';
import { SttService } from './stt.service';

@Module({
  controllers: [SttController],
  providers: [SttService, { provide: SPEECH_TO_TEXT, useExisting: SttService }],
  exports: [SPEECH_TO_TEXT],
})
export class SttModule {}
