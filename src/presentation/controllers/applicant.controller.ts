import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiProduces,
  ApiTags,
} from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import {
  ApplicantFilterQueryDto,
  ApplicantResponseDto,
  CreateApplicantDto,
  ListApplicantsQueryDto,
  PaginatedApplicantsResponseDto,
} from '@/application/dtos';
import { ApplicantService, IdentityService } from '@/application/services';

export const CALLER_HEADER = 'x-user-id';

@Controller('applicants')
@ApiTags('applicants')
@ApiHeader({ name: CALLER_HEADER, required: false, description: 'Id of the calling user' })
export class ApplicantController {
  constructor(
    private readonly applicantService: ApplicantService,
    private readonly identityService: IdentityService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Submit an intake record' })
  @ApiCreatedResponse({
    description: 'Applicant stored; auto number and total employees assigned',
    type: ApplicantResponseDto,
  })
  @ApiBadRequestResponse({ description: 'A field is missing or outside its allowed values' })
  @ApiForbiddenResponse({ description: 'The caller may not insert applicants' })
  async create(
    @Headers(CALLER_HEADER) userId: string | undefined,
    @Body() dto: CreateApplicantDto,
  ): Promise<ApplicantResponseDto> {
    const caller = await this.identityService.resolveCaller(userId);
    const applicant = await this.applicantService.insert(caller, dto);
    return ApplicantResponseDto.fromModel(applicant);
  }

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List applicants by auto number with pagination' })
  @ApiOkResponse({
    description: 'Applicant list returned successfully',
    type: PaginatedApplicantsResponseDto,
  })
  async findAll(
    @Headers(CALLER_HEADER) userId: string | undefined,
    @Query() query: ListApplicantsQueryDto,
  ): Promise<PaginatedApplicantsResponseDto> {
    const caller = await this.identityService.resolveCaller(userId);
    return this.applicantService.list(caller, {
      filter: ApplicantFilterQueryDto.toFilter(query),
      page: query.page,
      limit: query.limit,
    });
  }

  @Get('export/csv')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Export applicants in CSV format' })
  @ApiProduces('text/csv')
  @ApiOkResponse({
    description: 'CSV file with applicants',
    schema: {
      type: 'string',
      format: 'binary',
    },
  })
  async exportCsv(
    @Headers(CALLER_HEADER) userId: string | undefined,
    @Query() query: ApplicantFilterQueryDto,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const caller = await this.identityService.resolveCaller(userId);

    reply.raw.writeHead(200, {
      'Content-Type': 'text/csv',
      'Content-Disposition': `attachment; filename="applicants-${Date.now()}.csv"`,
      'Transfer-Encoding': 'chunked',
    });

    try {
      for await (const csvLine of this.applicantService.exportCsv(caller, ApplicantFilterQueryDto.toFilter(query))) {
        reply.raw.write(csvLine);
      }
      reply.raw.end();
    } catch (error) {
      // Headers are already sent; abort the connection.
      reply.raw.destroy();
      throw error;
    }
  }

  @Get(':auto_number')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Find applicant by auto number' })
  @ApiParam({ name: 'auto_number', description: 'Sequential intake number', example: 1 })
  @ApiOkResponse({
    description: 'Applicant found',
    type: ApplicantResponseDto,
  })
  @ApiNotFoundResponse({ description: 'Applicant not found' })
  async findByAutoNumber(
    @Headers(CALLER_HEADER) userId: string | undefined,
    @Param('auto_number', ParseIntPipe) autoNumber: number,
  ): Promise<ApplicantResponseDto> {
    const caller = await this.identityService.resolveCaller(userId);
    const applicant = await this.applicantService.findByAutoNumber(caller, autoNumber);
    return ApplicantResponseDto.fromModel(applicant);
  }
}
