import { IsIn } from 'class-validator';
import { SESSION_MODES, type SessionMode } from '../history.types';

export class CreateSessionDto {
  @IsIn(SESSION_MODES)
  mode!: SessionMode;
}
