import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  LEARNING_MODES,
  LearningMode,
} from '../../common/constants/learning-modes';

export class HistoryQueryDto {
  @ApiProperty({
    required: false,
    description: 'Only sessions of this mode',
    enum: LEARNING_MODES,
  })
  @IsOptional()
  @IsIn(LEARNING_MODES)
  mode?: LearningMode;

  @ApiProperty({ required: false, default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  page: number = 1;

  @ApiProperty({ required: false, default: 10, maximum: 50 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  @Type(() => Number)
  limit: number = 10;
}

export class SessionLookupDto {
  @ApiProperty({ example: 'Music' })
  @IsString()
  @IsNotEmpty()
  topic!: string;

  @ApiProperty({ example: 'Rhythm and Tempo' })
  @IsString()
  @IsNotEmpty()
  subtopic!: string;

  @ApiProperty({ example: 'middle' })
  @IsString()
  @IsNotEmpty()
  learningLevel!: string;
}
