import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { diskStorage } from 'multer';
import {
  abortOnDisconnect,
  type ClosableResponse,
} from '../common/request-signal';
import { AgentResolveDto, AgentTurnDto, AgentVoiceDto } from './agent.dto';
import { AgentService } from './agent.service';
import type {
  ResolveResult,
  TurnResult,
  VoiceTurnResult,
} from './agent.types';

@Controller('agent')
export class AgentController {
  constructor(private readonly agentService: AgentService) {}

  @Post('turn')
  @HttpCode(200)
  async turn(
    @Body() dto: AgentTurnDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<TurnResult> {
    return this.agentService.processTurn(dto, abortOnDisconnect(res));
  }

  @Post('resolve')
  @HttpCode(200)
  resolve(@Body() dto: AgentResolveDto): ResolveResult {
    return this.agentService.resolve(dto.text);
  }

  @Post('voice')
  @HttpCode(200)
  @UseInterceptors(
    FileInterceptor('audio', {
      storage: diskStorage({
        destination: './uploads',
        filename: (_req, _file, cb) => cb(null, `${Date.now()}-audio.webm`),
      }),
      limits: { fileSize: 25 * 1024 * 1024 },
    }),
  )
  async voice(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: AgentVoiceDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<VoiceTurnResult> {
    if (!file) throw new BadRequestException('No audio file provided');
    return this.agentService.processVoice(
      file.path,
      dto.sessionId,
      abortOnDisconnect(res),
    );
  }
}
