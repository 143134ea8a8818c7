import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ApiKeyGuard } from './api-key.guard';

describe('ApiKeyGuard', () => {
  const buildContext = (headers: Record<string, string>) =>
    ({
      getHandler: () => undefined,
      getClass: () => undefined,
      switchToHttp: () => ({
        getRequest: () => ({ headers, path: '/users' }),
      }),
    }) as unknown as ExecutionContext;

  const buildGuard = (apiKey: string | undefined, isPublic = false) => {
    const reflector = { getAllAndOverride: jest.fn().mockReturnValue(isPublic) } as unknown as Reflector;
    const config = { get: jest.fn().mockReturnValue(apiKey) } as unknown as ConfigService;
    return new ApiKeyGuard(reflector, config);
  };

  it('lets every request through when no key is configured', () => {
    expect(buildGuard(undefined).canActivate(buildContext({}))).toBe(true);
  });

  it('accepts a matching x-api-key header', () => {
    const guard = buildGuard('test-api-key-0000');
    expect(guard.canActivate(buildContext({ 'x-api-key': 'test-api-key-0000' }))).toBe(true);
  });

  it('accepts a matching bearer token', () => {
    const guard = buildGuard('test-api-key-0000');
    expect(guard.canActivate(buildContext({ authorization: 'Bearer test-api-key-0000' }))).toBe(true);
  });

  it('rejects a missing or wrong key', () => {
    const guard = buildGuard('test-api-key-0000');
    expect(() => guard.canActivate(buildContext({}))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(buildContext({ 'x-api-key': 'wrong' }))).toThrow(UnauthorizedException);
  });

  it('skips the check on public routes', () => {
    const guard = buildGuard('test-api-key-0000', true);
    expect(guard.canActivate(buildContext({}))).toBe(true);
  });
});
