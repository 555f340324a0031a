import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import type { SpeakingPart } from '../../evaluation/evaluation.types';
import { AudioMetricsDto } from './audio-metrics.dto';
import { WordTimingDto } from './word-timing.dto';

export class SpeakingAssessmentDto {
  @IsOptional()
  @IsInt()
  sessionId?: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  questionText!: string;

  @IsIn([1, 2, 3])
  partNumber!: SpeakingPart;

  @IsString()
  @MaxLength(20000)
  transcript!: string;

  @IsOptional()
  @IsString()
  topic?: string;

  @IsOptional()
  @IsString()
  source?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20000)
  referenceAnswer?: string;

  @IsOptional()
  @IsBoolean()
  enhanced?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => AudioMetricsDto)
  audioMetrics?: AudioMetricsDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WordTimingDto)
  words?: WordTimingDto[];

  @IsOptional()
  @IsNumber()
  duration?: number;
}
