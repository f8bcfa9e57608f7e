import { Module } from '@nestjs/common';
import { DESKTOP } from '../collaborators/collaborator.ports';
import { DesktopService } from './desktop.service';

@Module({
  providers: [DesktopService, { provide: DESKTOP, useExisting: DesktopService }],
  exports: [DESKTOP],
})
export class DesktopModule {}
