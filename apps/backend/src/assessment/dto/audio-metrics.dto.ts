import { IsInt, IsNumber } from 'class-validator';

export class AudioMetricsDto {
  @IsNumber()
  duration!: number;

  @IsNumber()
  speechRate!: number;

  @IsNumber()
  pauseRatio!: number;

  @IsNumber()
  pronunciationConfidence!: number;

  @IsInt()
  longPauses!: number;
}
