import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Error answered on the challenge channel, shaped like an EMVCo error
 * message: `{ errorCode, errorDescription }`.
 */
export class ChallengeException extends HttpException {
  constructor(status: HttpStatus, description: string) {
    super({ errorCode: String(status), errorDescription: description }, status);
  }
}
