import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MetricsGuard } from './metrics.guard';

describe('MetricsGuard', () => {
  const createGuard = (allowedIps: string[]): MetricsGuard => {
    const configService = {
      get: jest.fn(() => allowedIps),
    };
    return new MetricsGuard(configService as unknown as ConfigService);
  };

  const createMockExecutionContext = (
    remoteAddress: string,
    forwardedFor?: string,
  ): ExecutionContext => {
    const request = {
      headers: { 'x-forwarded-for': forwardedFor },
      socket: { remoteAddress },
      ip: remoteAddress,
    };

    return {
      switchToHttp: () => ({
        getRequest: () => request,
      }),
    } as ExecutionContext;
  };

  it('should allow a whitelisted address', () => {
    const guard = createGuard(['127.0.0.1']);

    expect(guard.canActivate(createMockExecutionContext('127.0.0.1'))).toBe(true);
  });

  it('should reject other addresses', () => {
    const guard = createGuard(['127.0.0.1']);

    expect(() => guard.canActivate(createMockExecutionContext('203.0.113.9'))).toThrow(
      UnauthorizedException,
    );
  });

  it('should prefer the first forwarded address', () => {
    const guard = createGuard(['198.51.100.4']);

    expect(
      guard.canActivate(createMockExecutionContext('10.0.0.2', '198.51.100.4, 10.0.0.1')),
    ).toBe(true);
  });

  it('should match an IPv4 network', () => {
    const guard = createGuard(['10.0.0.0/8']);

    expect(guard.canActivate(createMockExecutionContext('10.0.0.17'))).toBe(true);
    expect(guard.canActivate(createMockExecutionContext('10.1.2.3'))).toBe(true);
    expect(guard.canActivate(createMockExecutionContext('::ffff:10.200.0.1'))).toBe(true);
  });

  it('should reject addresses outside the network', () => {
    const guard = createGuard(['192.168.1.0/24']);

    expect(guard.canActivate(createMockExecutionContext('192.168.1.250'))).toBe(true);
    expect(() => guard.canActivate(createMockExecutionContext('192.168.10.5'))).toThrow(
      UnauthorizedException,
    );
    expect(() => guard.canActivate(createMockExecutionContext('11.0.0.1'))).toThrow(
      UnauthorizedException,
    );
  });

  it('should ignore malformed networks', () => {
    const guard = createGuard(['10.0.0.0/', '10.0.0.0/40']);

    expect(() => guard.canActivate(createMockExecutionContext('10.0.0.1'))).toThrow(
      UnauthorizedException,
    );
  });

  it('should allow everyone with a wildcard', () => {
    const guard = createGuard(['*']);

    expect(guard.canActivate(createMockExecutionContext('203.0.113.9'))).toBe(true);
  });
});
