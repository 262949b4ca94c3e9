import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
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
import { AuthUser } from '../auth/interfaces/auth-user.interface';
import {
  AnswerQuestionDto,
  CreateTutoringSessionDto,
  ResumeSessionDto,
  SelectModeDto,
  SelectSubtopicDto,
  SendMessageDto,
} from './dto/tutoring.dto';
import { TutoringService } from './tutoring.service';

@ApiTags('Tutoring Sessions')
@Controller('sessions')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class TutoringController {
  constructor(private readonly tutoringService: TutoringService) {}

  @Post()
  @ApiOperation({ summary: 'Start a session on a topic' })
  @ApiResponse({ status: 201, description: 'Session created with subtopics' })
  @ApiResponse({ status: 400, description: 'Topic missing' })
  create(
    @CurrentUser() user: AuthUser,
    @Body() dto: CreateTutoringSessionDto
  ) {
    return this.tutoringService.create(user, dto);
  }

  @Get()
  @ApiOperation({ summary: 'List your in-progress sessions' })
  list(@CurrentUser() user: AuthUser) {
    return this.tutoringService.listSessions(user);
  }

  @Post('resume')
  @UseGuards(RegisteredUserGuard)
  @ApiOperation({ summary: 'Resume a saved lesson or retake a saved quiz' })
  @ApiResponse({ status: 201, description: 'Session rebuilt from history' })
  @ApiResponse({ status: 404, description: 'No saved session' })
  resume(
    @CurrentUser() user: AuthUser,
    @CurrentUser('userId') userId: number,
    @Body() dto: ResumeSessionDto
  ) {
    return this.tutoringService.resume(user, userId, dto);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get the current state of a session' })
  @ApiResponse({ status: 404, description: 'Session not found' })
  get(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string
  ) {
    return this.tutoringService.getSession(user, id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Discard a session' })
  @ApiResponse({ status: 204, description: 'Session discarded' })
  async remove(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string
  ) {
    await this.tutoringService.deleteSession(user, id);
  }

  @Post(':id/subtopic')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Pick one of the suggested subtopics' })
  @ApiResponse({ status: 409, description: 'Subtopic already chosen' })
  selectSubtopic(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SelectSubtopicDto
  ) {
    return this.tutoringService.selectSubtopic(user, id, dto.subtopic);
  }

  @Post(':id/custom-subtopic')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Pick your own subtopic within the topic' })
  @ApiResponse({ status: 400, description: 'Subtopic missing or unrelated' })
  selectCustomSubtopic(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SelectSubtopicDto
  ) {
    return this.tutoringService.selectCustomSubtopic(user, id, dto.subtopic);
  }

  @Post(':id/mode')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start the lesson or the quiz' })
  selectMode(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SelectModeDto
  ) {
    return this.tutoringService.selectMode(user, id, dto.mode);
  }

  @Post(':id/messages')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reply to the teacher' })
  sendMessage(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SendMessageDto
  ) {
    return this.tutoringService.sendMessage(user, id, dto);
  }

  @Post(':id/quiz/answers')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Answer the current quiz question' })
  answer(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AnswerQuestionDto
  ) {
    return this.tutoringService.answerQuestion(user, id, dto);
  }

  @Post(':id/quiz/retake')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Take the same quiz again' })
  retake(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string
  ) {
    return this.tutoringService.retakeQuiz(user, id);
  }

  @Get(':id/quiz/result')
  @ApiOperation({ summary: 'Score and answer review of a finished quiz' })
  @ApiResponse({ status: 409, description: 'Quiz not finished yet' })
  result(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string
  ) {
    return this.tutoringService.getQuizResult(user, id);
  }
}
