import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ThreeDsRequestorAuthenticationInfoDto {
  @ApiProperty({ example: '01' })
  @IsString()
  threeDsReqAuthMethod!: string;

  @ApiProperty({ example: '202401011200' })
  @IsString()
  threeDsReqAuthTimestamp!: string;
}

export class ThreeDsRequestorDto {
  @ApiProperty({ example: '01' })
  @IsString()
  threeDsRequestorAuthenticationInd!: string;

  @ApiProperty({ type: ThreeDsRequestorAuthenticationInfoDto })
  @ValidateNested()
  @Type(() => ThreeDsRequestorAuthenticationInfoDto)
  threeDsRequestorAuthenticationInfo!: ThreeDsRequestorAuthenticationInfoDto;

  @ApiProperty({
    description: '`04` forces a challenge, `05` requests none; anything else follows the card number.',
    example: '01',
  })
  @IsString()
  threeDsRequestorChallengeInd!: string;
}

export class CardholderAccountDto {
  @ApiProperty({ example: '02' })
  @IsString()
  acctType!: string;

  @ApiProperty({ example: '2812' })
  @IsString()
  cardExpiryDate!: string;

  @ApiProperty({ example: 'Mastercard' })
  @IsString()
  schemeId!: string;

  @ApiProperty({ description: 'Cards ending in 4001 are challenged by default.', example: '5155010000004001' })
  @IsString()
  @IsNotEmpty()
  acctNumber!: string;

  @ApiProperty({ example: '123' })
  @IsString()
  cardSecurityCode!: string;
}

export class PhoneDto {
  @ApiProperty({ example: '1' })
  @IsString()
  cc!: string;

  @ApiProperty({ example: '5550100' })
  @IsString()
  subscriber!: string;
}

export class CardholderDto {
  @ApiProperty({ example: 'Y' })
  @IsString()
  addrMatch!: string;

  @ApiProperty() @IsString() billAddrCity!: string;
  @ApiProperty() @IsString() billAddrCountry!: string;
  @ApiProperty() @IsString() billAddrLine1!: string;
  @ApiProperty() @IsString() billAddrLine2!: string;
  @ApiProperty() @IsString() billAddrLine3!: string;
  @ApiProperty() @IsString() billAddrPostCode!: string;
  @ApiProperty() @IsString() email!: string;

  @ApiProperty({ type: PhoneDto })
  @ValidateNested()
  @Type(() => PhoneDto)
  homePhone!: PhoneDto;

  @ApiProperty({ type: PhoneDto })
  @ValidateNested()
  @Type(() => PhoneDto)
  mobilePhone!: PhoneDto;

  @ApiProperty({ type: PhoneDto })
  @ValidateNested()
  @Type(() => PhoneDto)
  workPhone!: PhoneDto;

  @ApiProperty() @IsString() cardholderName!: string;
  @ApiProperty() @IsString() shipAddrCity!: string;
  @ApiProperty() @IsString() shipAddrCountry!: string;
  @ApiProperty() @IsString() shipAddrLine1!: string;
  @ApiProperty() @IsString() shipAddrLine2!: string;
  @ApiProperty() @IsString() shipAddrLine3!: string;
  @ApiProperty() @IsString() shipAddrPostCode!: string;
}

export class PurchaseDto {
  @ApiProperty() @IsInt() @Min(0) purchaseInstalData!: number;
  @ApiProperty({ description: 'Amount in minor units.' }) @IsInt() @Min(0) purchaseAmount!: number;
  @ApiProperty({ example: '840' }) @IsString() purchaseCurrency!: string;
  @ApiProperty({ example: 2 }) @IsInt() @Min(0) purchaseExponent!: number;
  @ApiProperty({ example: '20240101120000' }) @IsString() purchaseDate!: string;
  @ApiProperty() @IsString() recurringExpiry!: string;
  @ApiProperty() @IsInt() @Min(0) recurringFrequency!: number;
  @ApiProperty({ example: '01' }) @IsString() transType!: string;
}

export class AcquirerDto {
  @ApiProperty() @IsString() acquirerBin!: string;
  @ApiProperty() @IsString() acquirerMerchantId!: string;
}

export class MerchantDto {
  @ApiProperty({ example: '5411' }) @IsString() mcc!: string;
  @ApiProperty({ example: '840' }) @IsString() merchantCountryCode!: string;
  @ApiProperty() @IsString() threeDsRequestorId!: string;
  @ApiProperty() @IsString() threeDsRequestorName!: string;
  @ApiProperty() @IsString() merchantName!: string;
  @ApiProperty() @IsString() resultsResponseNotificationUrl!: string;

  @ApiProperty({ description: 'Where the browser challenge redirects when no redirectUrl is given.' })
  @IsString()
  notificationUrl!: string;
}

export class BrowserInformationDto {
  @ApiProperty() @IsString() browserAcceptHeader!: string;
  @ApiProperty() @IsString() browserIP!: string;
  @ApiProperty() @IsString() browserLanguage!: string;
  @ApiProperty() @IsString() browserColorDepth!: string;
  @ApiProperty() @IsInt() @Min(0) browserScreenHeight!: number;
  @ApiProperty() @IsInt() @Min(0) browserScreenWidth!: number;
  @ApiProperty() @IsInt() browserTZ!: number;
  @ApiProperty() @IsString() browserUserAgent!: string;
  @ApiProperty() @IsString() challengeWindowSize!: string;
  @ApiProperty() @IsBoolean() browserJavaEnabled!: boolean;
  @ApiProperty() @IsBoolean() browserJavascriptEnabled!: boolean;
}

export class DeviceRenderOptionsDto {
  @ApiProperty({ example: '03' })
  @IsString()
  sdkInterface!: string;

  @ApiProperty({ example: ['01', '02'] })
  @IsArray()
  @IsString({ each: true })
  sdkUiType!: string[];

  @ApiProperty({ example: ['01'] })
  @IsArray()
  @IsString({ each: true })
  sdkAuthenticationType!: string[];
}

export class SdkEphemeralPublicKeyDto {
  @ApiProperty({ example: 'EC' }) @IsString() kty!: string;
  @ApiProperty({ example: 'P-256' }) @IsString() crv!: string;
  @ApiProperty({ description: 'Base64url x coordinate.' }) @IsString() x!: string;
  @ApiProperty({ description: 'Base64url y coordinate.' }) @IsString() y!: string;
}

/**
 * AReq as sent by the 3DS requestor. Mobile SDKs may send their ephemeral
 * key either nested (`sdkEphemeralPublicKey`) or as top-level
 * `Kty`/`Crv`/`X`/`Y`.
 */
export class AuthenticateRequestDto {
  @ApiProperty({ description: 'ID returned by /3ds/version.' })
  @IsUUID()
  threeDsServerTransId!: string;

  @ApiPropertyOptional({ description: 'Required when deviceChannel is 01 (app).' })
  @IsOptional()
  @IsUUID()
  sdkTransId?: string;

  @ApiProperty({ description: '01 = app (mobile SDK), 02 = browser.', example: '02' })
  @IsString()
  @IsIn(['01', '02', '03'])
  deviceChannel!: string;

  @ApiProperty({ example: '01' }) @IsString() messageCategory!: string;
  @ApiProperty({ example: '2.2.0' }) @IsString() preferredProtocolVersion!: string;
  @ApiProperty() @IsBoolean() enforcePreferredProtocolVersion!: boolean;
  @ApiProperty({ example: 'Y' }) @IsString() threeDsCompInd!: string;

  @ApiProperty({ type: ThreeDsRequestorDto })
  @ValidateNested()
  @Type(() => ThreeDsRequestorDto)
  threeDsRequestor!: ThreeDsRequestorDto;

  @ApiProperty({ type: CardholderAccountDto })
  @ValidateNested()
  @Type(() => CardholderAccountDto)
  cardholderAccount!: CardholderAccountDto;

  @ApiProperty({ type: CardholderDto })
  @ValidateNested()
  @Type(() => CardholderDto)
  cardholder!: CardholderDto;

  @ApiProperty({ type: PurchaseDto })
  @ValidateNested()
  @Type(() => PurchaseDto)
  purchase!: PurchaseDto;

  @ApiProperty({ type: AcquirerDto })
  @ValidateNested()
  @Type(() => AcquirerDto)
  acquirer!: AcquirerDto;

  @ApiProperty({ type: MerchantDto })
  @ValidateNested()
  @Type(() => MerchantDto)
  merchant!: MerchantDto;

  @ApiPropertyOptional({ type: BrowserInformationDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => BrowserInformationDto)
  browserInformation?: BrowserInformationDto;

  @ApiProperty({ type: DeviceRenderOptionsDto })
  @ValidateNested()
  @Type(() => DeviceRenderOptionsDto)
  deviceRenderOptions!: DeviceRenderOptionsDto;

  @ApiPropertyOptional({ type: SdkEphemeralPublicKeyDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => SdkEphemeralPublicKeyDto)
  sdkEphemeralPublicKey?: SdkEphemeralPublicKeyDto;

  @ApiPropertyOptional({ description: 'Top-level SDK key type.' }) @IsOptional() @IsString() Kty?: string;
  @ApiPropertyOptional({ description: 'Top-level SDK key curve.' }) @IsOptional() @IsString() Crv?: string;
  @ApiPropertyOptional({ description: 'Top-level SDK key x.' }) @IsOptional() @IsString() X?: string;
  @ApiPropertyOptional({ description: 'Top-level SDK key y.' }) @IsOptional() @IsString() Y?: string;
}
