import { Module } from '@nestjs/common';
import { DesktopModule } from '../desktop/desktop.module';
import { LanguageNormalizer } from '../language/language.normalizer';
import { LlmModule } from '../llm/llm.module';
import { SearchModule } from '../search/search.module';
import { SttModule } from '../stt/stt.module';
import { TtsModule } from '../tts/tts.module';
import { VisionModule } from '../vision/vision.module';
import { AgentController } from './agent.controller';
import { AgentService } from './agent.service';
import { ContextStoreRegistry } from './context/context-store.registry';
import { IntentResolver } from './intent/intent.resolver';
import { ParameterExtractor } from './intent/parameter.extractor';
import {
  loadDefaultTriggerTable,
  TRIGGER_TABLE,
} from './intent/trigger-table';
import {
  VISION_QUESTIONS,
  VisionQuestionBuilder,
} from './intent/vision-question';
import { DispatcherService } from './router/dispatcher.service';

@Module({
  imports: [
    LlmModule,
    VisionModule,
    SearchModule,
    DesktopModule,
    SttModule,
    TtsModule,
  ],
  controllers: [AgentController],
  providers: [
    { provide: TRIGGER_TABLE, useFactory: loadDefaultTriggerTable },
    { provide: VISION_QUESTIONS, useFactory: VisionQuestionBuilder.loadDefault },
    LanguageNormalizer,
    IntentResolver,
    ParameterExtractor,
    DispatcherService,
    ContextStoreRegistry,
    AgentService,
  ],
  exports: [AgentService],
})
export class AgentModule {}
