export { ApplicantFilterQueryDto, ListApplicantsQueryDto } from './applicant-filter-query.dto';
export { ApplicantResponseDto, PaginatedApplicantsResponseDto } from './applicant-response.dto';
export { CreateApplicantDto } from './create-applicant.dto';
export { CreateUserDto } from './create-user.dto';
export { ComponentHealthDto, HealthResponseDto } from './health-response.dto';
export type { HealthStatus } from './health-response.dto';
export { PaginationDto } from './pagination.dto';
export { UpdateApplicantDto } from './update-applicant.dto';
export { UserCredentialsResponseDto, UserResponseDto } from './user-response.dto';
