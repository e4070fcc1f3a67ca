import { ApiProperty } from '@nestjs/swagger';
import { Applicant } from '@/domain/models';
import { CreateApplicantDto } from './create-applicant.dto';

export class ApplicantResponseDto extends CreateApplicantDto {
  @ApiProperty({ description: 'Applicant ID', format: 'uuid' })
  id!: string;

  @ApiProperty({ description: 'Sequential intake number', example: 1 })
  autoNumber!: number;

  @ApiProperty({ description: 'Male plus female employees', example: 5 })
  totalEmployees!: number;

  @ApiProperty({
    description: 'Creation date',
    example: '2024-05-20T10:30:00.000Z',
  })
  createdAt!: Date;

  static fromModel(applicant: Applicant): ApplicantResponseDto {
    return Object.assign(new ApplicantResponseDto(), applicant.toPlainObject());
  }
}

export class PaginatedApplicantsResponseDto {
  @ApiProperty({ type: [ApplicantResponseDto], description: 'Applicant list' })
  data!: ApplicantResponseDto[];

  @ApiProperty({ description: 'Total records', example: 100 })
  total!: number;

  @ApiProperty({ description: 'Current page', example: 1 })
  page!: number;

  @ApiProperty({ description: 'Items per page', example: 10 })
  limit!: number;

  @ApiProperty({ description: 'Total pages', example: 10 })
  totalPages!: number;
}
