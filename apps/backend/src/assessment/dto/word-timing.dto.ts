import { IsNumber, IsString } from 'class-validator';

export class WordTimingDto {
  @IsString()
  text!: string;

  @IsNumber()
  start!: number;

  @IsNumber()
  end!: number;

  @IsNumber()
  probability!: number;
}
