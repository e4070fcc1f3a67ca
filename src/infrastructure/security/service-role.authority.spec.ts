import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AuthorizationDenied } from '@/domain/errors';
import { ElevatedTrust } from '@/domain/policies';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { ServiceRoleAuthority } from './service-role.authority';

describe('ServiceRoleAuthority', () => {
  const serviceKey = 'test-service-role-key';
  let mockLogger: jest.Mocked<ILogger>;

  const build = async (configured: string | undefined): Promise<ServiceRoleAuthority> => {
    mockLogger = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ServiceRoleAuthority,
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(configured) } },
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    return module.get<ServiceRoleAuthority>(ServiceRoleAuthority);
  };

  it('should grant a genuine capability for the configured key', async () => {
    const authority = await build(serviceKey);

    const trust = authority.authorize(serviceKey);

    expect(ElevatedTrust.isGenuine(trust)).toBe(true);
  });

  it('should deny a wrong key and log the refusal', async () => {
    const authority = await build(serviceKey);

    expect(() => authority.authorize('test-service-role-kez')).toThrow(AuthorizationDenied);
    expect(mockLogger.warn).toHaveBeenCalledWith('Elevated access refused', { keyPresented: true });
  });

  it('should deny a missing key', async () => {
    const authority = await build(serviceKey);

    expect(() => authority.authorize(undefined)).toThrow(AuthorizationDenied);
    expect(mockLogger.warn).toHaveBeenCalledWith('Elevated access refused', { keyPresented: false });
  });

  it('should deny everything when no key is configured', async () => {
    const authority = await build(undefined);

    expect(() => authority.authorize(serviceKey)).toThrow(AuthorizationDenied);
  });
});
