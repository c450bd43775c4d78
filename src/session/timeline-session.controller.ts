import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  Inject,
  Param,
  Post,
  Put,
  UseFilters,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';

import { toIdentifier } from '../common/types.js';
import { TimelineErrorFilter } from '../common/timeline-error.filter.js';
import { TimelineSessionService } from './timeline-session.service.js';
import { AddRepositoryDto } from './dto/add-repository.dto.js';
import { DateRangeDto } from './dto/date-range.dto.js';
import { SetTokenDto } from './dto/set-token.dto.js';

@ApiTags('timeline')
@UseFilters(TimelineErrorFilter)
@Controller()
export class TimelineSessionController {
  constructor(
    @Inject(TimelineSessionService) private readonly session: TimelineSessionService,
  ) {}

  @Post('session/token')
  @HttpCode(200)
  @ApiOperation({ summary: 'Verify a GitHub token and use it for this session' })
  @ApiBody({ type: SetTokenDto })
  setToken(@Body() body: SetTokenDto) {
    return this.session.setToken(body.token);
  }

  @Get('repositories')
  @ApiOperation({ summary: 'Tracked repositories in insertion order' })
  listRepositories() {
    return this.session.listRepositories();
  }

  // POST /repositories  { "url": "https://github.com/owner/repo" }
  @Post('repositories')
  @ApiOperation({ summary: 'Fetch all releases of a repository and start tracking it' })
  @ApiBody({ type: AddRepositoryDto })
  addRepository(@Body() body: AddRepositoryDto) {
    return this.session.addRepository(body.url, body.token);
  }

  @Delete('repositories/:owner/:name')
  @ApiOperation({ summary: 'Stop tracking a repository' })
  removeRepository(@Param('owner') owner: string, @Param('name') name: string) {
    return this.session.removeRepository(toIdentifier(owner, name));
  }

  @Post('repositories/:owner/:name/refresh')
  @HttpCode(200)
  @ApiOperation({ summary: 'Re-fetch the releases of a tracked repository' })
  @ApiHeader({ name: 'x-github-token', required: false, description: 'Overrides the session token' })
  refreshRepository(
    @Param('owner') owner: string,
    @Param('name') name: string,
    @Headers('x-github-token') token?: string,
  ) {
    return this.session.refreshRepository(toIdentifier(owner, name), token);
  }

  @Put('timeline/range')
  @ApiOperation({ summary: 'Restrict the timeline to an inclusive date range' })
  @ApiBody({ type: DateRangeDto })
  setDateRange(@Body() body: DateRangeDto) {
    return this.session.setDateRange(body.start, body.end);
  }

  @Delete('timeline/range')
  @HttpCode(204)
  @ApiOperation({ summary: 'Show all releases again' })
  clearDateRange(): void {
    this.session.clearDateRange();
  }

  @Get('timeline/chart')
  @ApiOperation({ summary: 'Chart description: one point per release, one lane per repository' })
  getChartSpec() {
    return this.session.getChartSpec();
  }

  @Get('timeline/statistics')
  @ApiOperation({ summary: 'Release counts and bounds for the current range' })
  getStatistics() {
    return this.session.getStatistics();
  }
}
