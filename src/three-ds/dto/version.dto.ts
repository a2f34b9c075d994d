import { IsNotEmpty, IsNumberString, IsString, MaxLength, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class VersionRequestDto {
  @ApiProperty({
    description: 'Primary account number used to look up the card range.',
    example: '5155010000004001',
  })
  @IsString()
  @IsNotEmpty()
  @IsNumberString({ no_symbols: true })
  @MinLength(12)
  @MaxLength(19)
  cardNumber!: string;
}

export class CardRangeDto {
  @ApiProperty({ example: ['01', '02'] })
  acsInfoInd!: string[];

  @ApiProperty({ example: '5155010000000000' })
  startRange!: string;

  @ApiProperty({ example: '2.2.0' })
  acsEndProtocolVersion!: string;

  @ApiProperty({ example: '2.2.0' })
  acsStartProtocolVersion!: string;

  @ApiProperty({ example: '5155019999999999' })
  endRange!: string;
}

export class VersionResponseDto {
  @ApiProperty({ description: 'New 3DS Server transaction ID (UUID v4).' })
  threeDsServerTransId!: string;

  @ApiProperty({ type: [CardRangeDto] })
  cardRanges!: CardRangeDto[];
}
