import {
  BadRequestException,
  Controller,
  HttpCode,
  Inject,
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
import {
  SPEECH_TO_TEXT,
  SpeechToText,
  Transcript,
} from '../collaborators/collaborator.ports';

@Controller('stt')
export class SttController {
  constructor(@Inject(SPEECH_TO_TEXT) private readonly stt: SpeechToText) {}

  @Post('transcribe')
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
  async transcribe(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<Transcript> {
    if (!file) throw new BadRequestException('No audio file provided');
    return this.stt.transcribe(file.path, abortOnDisconnect(res));
  }
}
