import { ApiPropertyOptional, IntersectionType } from '@nestjs/swagger';
import { IsOptional, IsString, IsUUID } from 'class-validator';
import type { ApplicantFilter } from '@/domain/repositories';
import { IsCalendarDate } from './field-decorators';
import { PaginationDto } from './pagination.dto';

export class ApplicantFilterQueryDto {
  @ApiPropertyOptional({ description: 'Exact region', example: 'Amhara' })
  @IsOptional()
  @IsString({ message: 'region must be a string' })
  region?: string;

  @ApiPropertyOptional({ description: 'Exact zone', example: 'North Gondar' })
  @IsOptional()
  @IsString({ message: 'zone must be a string' })
  zone?: string;

  @ApiPropertyOptional({ description: 'Exact woreda', example: 'Gondar Zuria' })
  @IsOptional()
  @IsString({ message: 'woreda must be a string' })
  woreda?: string;

  @ApiPropertyOptional({ description: 'Exact kebele', example: '05' })
  @IsOptional()
  @IsString({ message: 'kebele must be a string' })
  kebele?: string;

  @ApiPropertyOptional({ description: 'Collection batch', example: 'B-2024-01' })
  @IsOptional()
  @IsString({ message: 'batch must be a string' })
  batch?: string;

  @ApiPropertyOptional({ description: 'Collector user id', format: 'uuid' })
  @IsOptional()
  @IsUUID('all', { message: 'collected_by must be a UUID' })
  collected_by?: string;

  @ApiPropertyOptional({
    description: 'Collected on or after this date',
    example: '2024-01-01',
    type: String,
    format: 'date',
  })
  @IsOptional()
  @IsCalendarDate()
  collected_from?: string;

  @ApiPropertyOptional({
    description: 'Collected on or before this date',
    example: '2024-12-31',
    type: String,
    format: 'date',
  })
  @IsOptional()
  @IsCalendarDate()
  collected_to?: string;

  static toFilter(query: ApplicantFilterQueryDto): ApplicantFilter {
    return {
      region: query.region,
      zone: query.zone,
      woreda: query.woreda,
      kebele: query.kebele,
      batch: query.batch,
      collectedBy: query.collected_by,
      dateCollectedFrom: query.collected_from,
      dateCollectedTo: query.collected_to,
    };
  }
}

export class ListApplicantsQueryDto extends IntersectionType(ApplicantFilterQueryDto, PaginationDto) {}
