import { Module } from '@nestjs/common';
import { CAMERA, VISION_MODEL } from '../collaborators/collaborator.ports';
import { OllamaModule } from '../ollama/ollama.module';
import { CameraService } from './camera.service';
import { VisionService } from './vision.service';

@Module({
  imports: [OllamaModule],
  providers: [
    CameraService,
    VisionService,
    { provide: CAMERA, useExisting: CameraService },
    { provide: VISION_MODEL, useExisting: VisionService },
  ],
  exports: [CAMERA, VISION_MODEL],
})
export class VisionModule {}
