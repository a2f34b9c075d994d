import { Body, Controller, Header, HttpCode, HttpStatus, Post, Query, Redirect } from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ChallengeService } from './challenge.service';
import { ChallengeException } from './challenge.errors';
import { TriggerOtpFormDto, VerifyOtpFormDto } from './dto/otp-form.dto';
import { BROWSER_CHALLENGE_PATH, BROWSER_VERIFY_PATH, MOBILE_CHALLENGE_PATH } from '../three-ds/three-ds.constants';

@ApiTags('Challenge')
@Controller()
export class ChallengeController {
  constructor(private readonly challengeService: ChallengeService) {}

  /**
   * POST /challenge
   * Body is the raw compact JWE, read as text whatever its content type.
   */
  @Post(MOBILE_CHALLENGE_PATH)
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'application/jose')
  @ApiConsumes('application/jose', 'text/plain', 'application/octet-stream')
  @ApiOperation({
    summary: 'App Challenge (CReq/CRes)',
    description:
      'Receives an encrypted CReq from a device SDK. The JWE `kid` is the acsTransID; the response is the CRes encrypted with the same session key.',
  })
  @ApiResponse({ status: 200, description: 'Compact JWE carrying the CRes.' })
  @ApiResponse({ status: 400, description: 'Malformed JWE, missing keys, or decryption failure.' })
  @ApiResponse({ status: 404, description: 'No transaction for the acsTransID in `kid`.' })
  challenge(@Body() body: unknown): string {
    if (typeof body === 'string') {
      return this.challengeService.handleAppChallenge(body);
    }
    throw new ChallengeException(HttpStatus.BAD_REQUEST, 'Invalid request body encoding');
  }

  @Post(BROWSER_CHALLENGE_PATH)
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiConsumes('application/x-www-form-urlencoded')
  @ApiQuery({ name: 'redirectUrl', required: false, description: 'Where to send the cardholder afterwards.' })
  @ApiOperation({ summary: 'Browser Challenge Page', description: 'Renders the OTP form for a CReq.' })
  @ApiResponse({ status: 200, description: 'HTML OTP form.' })
  @ApiResponse({ status: 400, description: '`creq` is not a JSON CReq.' })
  triggerOtp(@Body() form: TriggerOtpFormDto, @Query('redirectUrl') redirectUrl?: string): string {
    return this.challengeService.renderOtpForm(form.creq, redirectUrl);
  }

  @Post(BROWSER_VERIFY_PATH)
  @Redirect(undefined, HttpStatus.FOUND)
  @ApiConsumes('application/x-www-form-urlencoded')
  @ApiQuery({ name: 'redirectUrl', required: false })
  @ApiOperation({
    summary: 'Verify Browser OTP',
    description: 'Records the challenge outcome and redirects to the merchant with transStatus, eci and authenticationValue.',
  })
  @ApiResponse({ status: 302, description: 'Redirect to the merchant; `transStatus=U` on any failure.' })
  verifyOtp(@Body() form: VerifyOtpFormDto, @Query('redirectUrl') redirectUrl?: string): { url: string } {
    return { url: this.challengeService.verifyOtp(form, redirectUrl) };
  }
}
