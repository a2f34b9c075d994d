import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBadRequestResponse, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ThreeDsService } from './three-ds.service';
import {
  AuthenticateRequestDto,
  AuthenticateResponseDto,
  FinalRequestDto,
  FinalResponseDto,
  ResultsRequestDto,
  ResultsResponseDto,
  VersionRequestDto,
  VersionResponseDto,
} from './dto';

@ApiTags('3DS')
@Controller('3ds')
export class ThreeDsController {
  constructor(private readonly threeDsService: ThreeDsService) {}

  @Post('version')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Look Up Card Range',
    description: 'Starts a transaction and returns the card range and protocol versions supported for the card.',
  })
  @ApiOkResponse({ type: VersionResponseDto })
  @ApiBadRequestResponse({ description: 'The card number is missing or not numeric.' })
  version(@Body() body: VersionRequestDto): VersionResponseDto {
    return this.threeDsService.getVersion(body);
  }

  @Post('authenticate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Authenticate (AReq)',
    description:
      'Decides between frictionless and challenge flows. App-channel challenges carry ACS signed content with a fresh ephemeral key.',
  })
  @ApiOkResponse({ type: AuthenticateResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid AReq, or an app-channel AReq without sdkTransId.' })
  authenticate(@Body() body: AuthenticateRequestDto): Promise<AuthenticateResponseDto> {
    return this.threeDsService.authenticate(body);
  }

  @Post('results')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Post Results (RReq)', description: 'Attaches the challenge outcome to a transaction.' })
  @ApiOkResponse({ type: ResultsResponseDto })
  @ApiBadRequestResponse({ description: 'Unknown or expired transaction.' })
  results(@Body() body: ResultsRequestDto): ResultsResponseDto {
    return this.threeDsService.recordResults(body);
  }

  @Post('final')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get Final Outcome', description: 'Returns ECI, authentication value and the RReq/RRes pair.' })
  @ApiOkResponse({ type: FinalResponseDto })
  @ApiBadRequestResponse({ description: 'Unknown transaction, or no results recorded yet.' })
  final(@Body() body: FinalRequestDto): FinalResponseDto {
    return this.threeDsService.getFinal(body);
  }
}
