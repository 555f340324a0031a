import { IsBoolean, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import type { WritingTaskType } from '../../evaluation/evaluation.types';

export class WritingAssessmentDto {
  @IsOptional()
  @IsInt()
  sessionId?: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(5000)
  promptText!: string;

  @IsString()
  @MaxLength(20000)
  essayText!: string;

  @IsIn([1, 2])
  taskType!: WritingTaskType;

  @IsOptional()
  @IsString()
  @MaxLength(20000)
  chartData?: string;

  @IsOptional()
  @IsBoolean()
  enhanced?: boolean;
}
