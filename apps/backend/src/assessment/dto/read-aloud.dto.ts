import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, ValidateNested } from 'class-validator';
import { AudioMetricsDto } from './audio-metrics.dto';
import { WordTimingDto } from './word-timing.dto';

export class ReadAloudDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(5000)
  referenceText!: string;

  @IsString()
  @MaxLength(20000)
  transcript!: string;

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
