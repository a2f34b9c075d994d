import { IsNotEmpty, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class TriggerOtpFormDto {
  @ApiProperty({
    description: 'CReq as JSON (not base64), as returned in challengeRequest by /3ds/authenticate.',
  })
  @IsString()
  @IsNotEmpty()
  creq!: string;
}

export class VerifyOtpFormDto {
  @ApiProperty({ description: 'One-time password typed by the cardholder.', example: '1234' })
  @IsString()
  otp!: string;

  @ApiProperty({ description: 'Transaction the OTP belongs to.' })
  @IsString()
  threeDSServerTransID!: string;
}
