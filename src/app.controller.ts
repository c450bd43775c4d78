import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { TimelineSessionService } from './session/timeline-session.service.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(
    @Inject(TimelineSessionService) private readonly session: TimelineSessionService,
  ) {}

  @Get('health')
  getHealth() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      tokenConfigured: this.session.hasToken,
      repositories: this.session.listRepositories().length,
    };
  }
}
