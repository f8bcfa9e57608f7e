import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ASSISTANT_CONFIG, assistantConfigFactory } from './assistant.config';

@Global()
@Module({
  providers: [
    {
      provide: ASSISTANT_CONFIG,
      inject: [ConfigService],
      useFactory: assistantConfigFactory,
    },
  ],
  exports: [ASSISTANT_CONFIG],
})
export class AssistantConfigModule {}
