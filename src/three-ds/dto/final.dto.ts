import { IsUUID } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { ResultsRequestDto, ResultsResponseDto } from './results.dto';

export class FinalRequestDto {
  @ApiProperty({ description: 'Transaction to report the outcome of.' })
  @IsUUID()
  threeDsServerTransId!: string;
}

export class FinalResponseDto {
  @ApiProperty({ example: '02' }) eci!: string;
  @ApiProperty() authenticationValue!: string;
  @ApiProperty() threeDsServerTransId!: string;
  @ApiProperty({ type: ResultsResponseDto }) resultsResponse!: ResultsResponseDto;
  @ApiProperty({ type: ResultsRequestDto }) resultsRequest!: ResultsRequestDto;
  @ApiProperty({ example: 'Y' }) transStatus!: string;
}
