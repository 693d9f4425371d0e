import { BaseError } from './base.error';

/**
 * Audio decode error - every decode strategy failed for a file
 */
export class AudioDecodeError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUDIO_DECODE_ERROR', 422, context, false);
  }
}
