import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AcsRenderingTypeResponseDto {
  @ApiProperty({ example: '01' }) deviceUserInterfaceMode!: string;
  @ApiProperty({ example: '01' }) acsInterface!: string;
  @ApiProperty({ example: '01' }) acsUiTemplate!: string;
}

export class BroadInfoDescriptionDto {
  @ApiProperty() message!: string;
}

export class BroadInfoDto {
  @ApiProperty() category!: string;
  @ApiProperty() severity!: string;
  @ApiProperty() source!: string;
  @ApiProperty({ type: [String] }) recipients!: string[];
  @ApiProperty({ type: BroadInfoDescriptionDto }) description!: BroadInfoDescriptionDto;
  @ApiProperty({ example: '20241231' }) expDate!: string;
}

/** ARes. Mobile-only members are absent for browser transactions. */
export class AuthenticationResponseDto {
  @ApiPropertyOptional() threeDsRequestorAppUrlInd?: string;
  @ApiProperty({ example: 'MOCK_ACS' }) acsOperatorID!: string;
  @ApiProperty({ example: 'MOCK_DS' }) dsReferenceNumber!: string;
  @ApiProperty({ example: '05' }) eci!: string;
  @ApiPropertyOptional({ description: 'PS256 JWT carrying the ACS ephemeral public key.' })
  acsSignedContent?: string;
  @ApiProperty() dsTransId!: string;
  @ApiPropertyOptional({ type: AcsRenderingTypeResponseDto }) acsRenderingType?: AcsRenderingTypeResponseDto;
  @ApiProperty({ example: 'ARes' }) messageType!: string;
  @ApiProperty() threeDsServerTransId!: string;
  @ApiProperty() acsTransId!: string;
  @ApiPropertyOptional({ type: BroadInfoDto }) broadInfo?: BroadInfoDto;
  @ApiPropertyOptional() authenticationMethod?: string;
  @ApiPropertyOptional() transStatusReason?: string;
  @ApiPropertyOptional() deviceInfoRecognisedVersion?: string;
  @ApiProperty({ example: 'Y' }) acsChallengeMandated!: string;
  @ApiProperty({ example: '02' }) authenticationType!: string;
  @ApiPropertyOptional() sdkTransId?: string;
  @ApiProperty() authenticationValue!: string;
  @ApiProperty({ example: 'C' }) transStatus!: string;
  @ApiProperty({ example: '2.2.0' }) messageVersion!: string;
  @ApiProperty({ example: 'issuer1' }) acsReferenceNumber!: string;
  @ApiPropertyOptional() acsUrl?: string;
}

export class ChallengeRequestDto {
  @ApiProperty({ example: 'CReq' }) messageType!: string;
  @ApiProperty() threeDsServerTransId!: string;
  @ApiProperty() acsTransId!: string;
  @ApiProperty({ example: '01' }) challengeWindowSize!: string;
  @ApiProperty({ example: '2.2.0' }) messageVersion!: string;
}

export class AuthenticateResponseDto {
  @ApiProperty() purchaseDate!: string;
  @ApiPropertyOptional({ description: 'Base64 of the CReq JSON, present when a challenge is required.' })
  base64EncodedChallengeRequest?: string;
  @ApiPropertyOptional() acsUrl?: string;
  @ApiProperty() threeDsServerTransId!: string;
  @ApiProperty({ type: AuthenticationResponseDto }) authenticationResponse!: AuthenticationResponseDto;
  @ApiProperty({ type: ChallengeRequestDto }) challengeRequest!: ChallengeRequestDto;
  @ApiProperty({ example: 'Y' }) acsChallengeMandated!: string;
  @ApiProperty({ example: 'C' }) transStatus!: string;
  @ApiProperty({ description: 'The AReq as forwarded to the DS, using EMVCo field names.' })
  authenticationRequest!: Record<string, unknown>;
}
