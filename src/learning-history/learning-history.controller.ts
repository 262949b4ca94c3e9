import {
  Controller,
  Get,
  NotFoundException,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RegisteredUserGuard } from '../auth/guards/registered-user.guard';
import { HistoryQueryDto, SessionLookupDto } from './dto/learning-history.dto';
import { LearningHistoryService } from './learning-history.service';

@ApiTags('Learning History')
@Controller('history')
@UseGuards(JwtAuthGuard, RegisteredUserGuard)
@ApiBearerAuth()
export class LearningHistoryController {
  constructor(private readonly learningHistoryService: LearningHistoryService) {}

  @Get()
  @ApiOperation({ summary: 'List saved sessions, most recent first' })
  @ApiResponse({ status: 200, description: 'History retrieved' })
  @ApiResponse({ status: 403, description: 'Guests have no history' })
  getHistory(
    @CurrentUser('userId') userId: number,
    @Query() query: HistoryQueryDto
  ) {
    return this.learningHistoryService.getUserHistory(userId, {
      mode: query.mode,
      page: query.page,
      limit: query.limit,
    });
  }

  @Get('session')
  @ApiOperation({ summary: 'Get one saved session' })
  @ApiResponse({ status: 200, description: 'Session retrieved' })
  @ApiResponse({ status: 404, description: 'No saved session' })
  getSession(
    @CurrentUser('userId') userId: number,
    @Query() query: SessionLookupDto
  ) {
    const entry = this.learningHistoryService.loadSession({ userId, ...query });
    if (!entry) {
      throw new NotFoundException('No saved session found');
    }
    return entry;
  }
}
