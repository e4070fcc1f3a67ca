import { ElevatedTrust } from './elevated-trust';

describe('ElevatedTrust', () => {
  const key = 'test-service-role-key';

  it('should be granted when the presented key matches', () => {
    const now = new Date('2024-05-20T08:00:00Z');
    const trust = ElevatedTrust.fromServiceKey(key, key, now);

    expect(trust).toBeInstanceOf(ElevatedTrust);
    expect(trust?.subject).toBe('service_role');
    expect(trust?.grantedAt).toBe(now);
    expect(ElevatedTrust.isGenuine(trust)).toBe(true);
  });

  it('should be refused for a different key of the same length', () => {
    expect(ElevatedTrust.fromServiceKey('test-service-role-kex', key)).toBeNull();
  });

  it('should be refused for a key of a different length', () => {
    expect(ElevatedTrust.fromServiceKey('short', key)).toBeNull();
  });

  it('should be refused when no key was presented', () => {
    expect(ElevatedTrust.fromServiceKey(undefined, key)).toBeNull();
    expect(ElevatedTrust.fromServiceKey('', key)).toBeNull();
  });

  it('should never be granted when no key is configured', () => {
    expect(ElevatedTrust.fromServiceKey(key, undefined)).toBeNull();
  });

  it('should not recognise look-alike objects', () => {
    const forged: unknown = Object.create(ElevatedTrust.prototype);

    expect(ElevatedTrust.isGenuine(forged)).toBe(false);
    expect(ElevatedTrust.isGenuine({ subject: 'service_role', grantedAt: new Date() })).toBe(false);
  });
});
