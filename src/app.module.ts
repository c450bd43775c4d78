// src/app.module.ts
import 'dotenv/config';
import { Module } from '@nestjs/common';

import { AppController } from './app.controller.js';
import { AppConfigModule } from './config/config.module.js';
import { TimelineSessionModule } from './session/timeline-session.module.js';

@Module({
  imports: [AppConfigModule, TimelineSessionModule],
  controllers: [AppController],
})
export class AppModule {}
