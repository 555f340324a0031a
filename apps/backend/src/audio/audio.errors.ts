import { HttpStatus } from '@nestjs/common';
import { BaseAppError } from '../common/errors';

export class MalformedAudioInputError extends BaseAppError {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST, 'MALFORMED_AUDIO_INPUT');
  }
}
