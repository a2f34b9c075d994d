import { Type } from 'class-transformer';
import { IsOptional, IsString, IsUUID, ValidateNested } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AcsRenderingTypeDto {
  @ApiProperty({ example: '01' })
  @IsString()
  acsUiTemplate!: string;

  @ApiProperty({ example: '01' })
  @IsString()
  acsInterface!: string;
}

/** RReq as posted by the ACS (or recorded after an OTP challenge). */
export class ResultsRequestDto {
  @ApiProperty() @IsUUID() acsTransId!: string;
  @ApiProperty({ example: '01' }) @IsString() messageCategory!: string;
  @ApiProperty({ example: '02' }) @IsString() eci!: string;
  @ApiProperty({ example: 'RReq' }) @IsString() messageType!: string;

  @ApiProperty({ type: AcsRenderingTypeDto })
  @ValidateNested()
  @Type(() => AcsRenderingTypeDto)
  acsRenderingType!: AcsRenderingTypeDto;

  @ApiProperty() @IsUUID() dsTransId!: string;
  @ApiProperty({ example: '02' }) @IsString() authenticationMethod!: string;
  @ApiProperty({ example: '02' }) @IsString() authenticationType!: string;
  @ApiProperty({ example: '2.2.0' }) @IsString() messageVersion!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsUUID()
  sdkTransId?: string | null;

  @ApiProperty({ example: '01' }) @IsString() interactionCounter!: string;
  @ApiProperty() @IsString() authenticationValue!: string;
  @ApiProperty({ example: 'Y' }) @IsString() transStatus!: string;
  @ApiProperty() @IsUUID() threeDsServerTransId!: string;
}

export class ResultsResponseDto {
  @ApiProperty() dsTransId!: string;
  @ApiProperty({ example: 'RRes' }) messageType!: string;
  @ApiProperty() threeDsServerTransId!: string;
  @ApiProperty() acsTransId!: string;
  @ApiProperty({ nullable: true, type: String }) sdkTransId!: string | null;
  @ApiProperty({ example: '01' }) resultsStatus!: string;
  @ApiProperty({ example: '2.2.0' }) messageVersion!: string;
}
