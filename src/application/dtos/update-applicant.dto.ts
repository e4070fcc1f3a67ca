import { PartialType } from '@nestjs/swagger';
import { CreateApplicantDto } from './create-applicant.dto';

/**
 * Patch applied through the elevated path. Every intake field is optional;
 * identity, sequence number and the derived total are not part of the shape
 * and are rejected by the whitelist.
 */
export class UpdateApplicantDto extends PartialType(CreateApplicantDto) {}
