import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import {
  LEARNING_LEVELS,
  LearningLevel,
} from '../../common/constants/learning-levels';
import {
  LEARNING_MODES,
  LearningMode,
} from '../../common/constants/learning-modes';

export class CreateTutoringSessionDto {
  @ApiProperty({ description: 'Anything you want to learn', example: 'Music' })
  @IsString()
  @MaxLength(200)
  topic!: string;

  @ApiProperty({ enum: LEARNING_LEVELS, example: 'middle' })
  @IsIn(LEARNING_LEVELS)
  learningLevel!: LearningLevel;
}

export class SelectSubtopicDto {
  @ApiProperty({ example: 'Rhythm and Tempo' })
  @IsString()
  @MaxLength(200)
  subtopic!: string;
}

export class SelectModeDto {
  @ApiProperty({ enum: LEARNING_MODES, example: 'learn' })
  @IsIn(LEARNING_MODES)
  mode!: LearningMode;
}

export class SendMessageDto {
  @ApiProperty({
    required: false,
    description: 'Question or answer for the teacher',
  })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  message?: string;

  @ApiProperty({
    required: false,
    description: 'Send "I don\'t know" instead of a message',
  })
  @IsOptional()
  @IsBoolean()
  dontKnow?: boolean;
}

export class AnswerQuestionDto {
  @ApiProperty({ description: '0-based index of the chosen option', example: 2 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  answerIndex!: number;
}

export class ResumeSessionDto {
  @ApiProperty({ example: 'Music' })
  @IsString()
  @IsNotEmpty()
  topic!: string;

  @ApiProperty({ example: 'Rhythm and Tempo' })
  @IsString()
  @IsNotEmpty()
  subtopic!: string;

  @ApiProperty({ enum: LEARNING_LEVELS, example: 'middle' })
  @IsIn(LEARNING_LEVELS)
  learningLevel!: LearningLevel;

  @ApiProperty({ enum: LEARNING_MODES, example: 'learn' })
  @IsIn(LEARNING_MODES)
  mode!: LearningMode;
}
