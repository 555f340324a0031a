import { IsString, MaxLength } from 'class-validator';

export class DetectFillersDto {
  @IsString()
  @MaxLength(20000)
  transcript!: string;
}
