import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
} from '@nestjs/common';
import {
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import {
  ApplicantResponseDto,
  CreateUserDto,
  UpdateApplicantDto,
  UserCredentialsResponseDto,
  UserResponseDto,
} from '@/application/dtos';
import { AdminApplicantService, IdentityService } from '@/application/services';
import { ServiceRoleAuthority } from '@/infrastructure/security';

export const SERVICE_ROLE_HEADER = 'x-service-role-key';

/**
 * Elevated-trust routes. Each handler exchanges the service role key for a
 * capability before touching a store.
 */
@Controller('admin')
@ApiTags('admin')
@ApiSecurity('service-role')
@ApiForbiddenResponse({ description: 'Missing or invalid service role key' })
export class AdminController {
  constructor(
    private readonly authority: ServiceRoleAuthority,
    private readonly adminApplicantService: AdminApplicantService,
    private readonly identityService: IdentityService,
  ) {}

  @Post('users')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Provision a user' })
  @ApiCreatedResponse({
    description: 'User created successfully',
    type: UserResponseDto,
  })
  @ApiConflictResponse({ description: 'email is already registered' })
  async createUser(
    @Headers(SERVICE_ROLE_HEADER) serviceKey: string | undefined,
    @Body() dto: CreateUserDto,
  ): Promise<UserResponseDto> {
    this.authority.authorize(serviceKey);
    const user = await this.identityService.createUser(dto);
    return UserResponseDto.fromEntity(user);
  }

  @Get('users/:email')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Find user credentials by email (case-insensitive)' })
  @ApiParam({ name: 'email', description: 'User email', example: 'collector@example.com' })
  @ApiOkResponse({
    description: 'User found',
    type: UserCredentialsResponseDto,
  })
  @ApiNotFoundResponse({ description: 'User not found' })
  async findUserByEmail(
    @Headers(SERVICE_ROLE_HEADER) serviceKey: string | undefined,
    @Param('email') email: string,
  ): Promise<UserCredentialsResponseDto> {
    this.authority.authorize(serviceKey);
    const user = await this.identityService.findByEmail(email);

    if (!user) {
      throw new NotFoundException(`User '${email}' not found`);
    }

    return UserCredentialsResponseDto.fromUser(user);
  }

  @Patch('applicants/:id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Correct an applicant record' })
  @ApiParam({ name: 'id', description: 'Applicant ID', format: 'uuid' })
  @ApiOkResponse({
    description: 'Applicant updated successfully',
    type: ApplicantResponseDto,
  })
  @ApiNotFoundResponse({ description: 'Applicant not found' })
  async updateApplicant(
    @Headers(SERVICE_ROLE_HEADER) serviceKey: string | undefined,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateApplicantDto,
  ): Promise<ApplicantResponseDto> {
    const trust = this.authority.authorize(serviceKey);
    const applicant = await this.adminApplicantService.update(trust, id, dto);
    return ApplicantResponseDto.fromModel(applicant);
  }

  @Delete('applicants/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove an applicant record' })
  @ApiParam({ name: 'id', description: 'Applicant ID', format: 'uuid' })
  @ApiNoContentResponse({ description: 'Applicant removed successfully' })
  @ApiNotFoundResponse({ description: 'Applicant not found' })
  async removeApplicant(
    @Headers(SERVICE_ROLE_HEADER) serviceKey: string | undefined,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    const trust = this.authority.authorize(serviceKey);
    return this.adminApplicantService.remove(trust, id);
  }
}
