import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { EVALUATION_KINDS, type EvaluationKind } from '../evaluation.types';
import type { EvaluationLogStatus } from '../evaluation-logs.service';

export class ListEvaluationLogsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  pageSize?: number;

  @IsOptional()
  @IsIn(EVALUATION_KINDS)
  kind?: EvaluationKind;

  @IsOptional()
  @IsIn(['OK', 'ERROR'])
  status?: EvaluationLogStatus;
}
