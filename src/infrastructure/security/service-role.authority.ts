import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthorizationDenied } from '@/domain/errors';
import { ElevatedTrust } from '@/domain/policies';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import type { EnvironmentVariables } from '@/infrastructure/config';

/**
 * Exchanges the service role key for an ElevatedTrust.
 * The only place in the application that mints one.
 */
@Injectable()
export class ServiceRoleAuthority {
  constructor(
    private readonly configService: ConfigService<EnvironmentVariables>,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * @param presentedKey - Value of the x-service-role-key header
   * @throws {AuthorizationDenied} When no key is configured or the key does not match
   */
  authorize(presentedKey: string | undefined): ElevatedTrust {
    const expectedKey = this.configService.get('SERVICE_ROLE_KEY', { infer: true });
    const trust = ElevatedTrust.fromServiceKey(presentedKey, expectedKey);

    if (!trust) {
      this.logger.warn('Elevated access refused', { keyPresented: Boolean(presentedKey) });
      throw new AuthorizationDenied('use the administrative path', 'A valid service role key is required');
    }

    return trust;
  }
}
