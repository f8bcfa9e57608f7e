import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AgentModule } from './agent/agent.module';
import { AssistantConfigModule } from './config/assistant-config.module';
import { validateEnvironment } from './config/assistant.config';
import { EventsModule } from './events/events.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnvironment }),
    EventEmitterModule.forRoot({ wildcard: true }),
    AssistantConfigModule,
    EventsModule,
    AgentModule,
  ],
})
export class AppModule {}
