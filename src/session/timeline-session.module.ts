import { Module } from '@nestjs/common';
import { ReleasesModule } from '../releases/releases.module.js';
import { TimelineSessionController } from './timeline-session.controller.js';
import { TimelineSessionService } from './timeline-session.service.js';

@Module({
  imports: [ReleasesModule],
  controllers: [TimelineSessionController],
  providers: [TimelineSessionService],
  exports: [TimelineSessionService],
})
export class TimelineSessionModule {}
