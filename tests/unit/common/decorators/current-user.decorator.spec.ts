import { ExecutionContext } from '@nestjs/common';
import { ROUTE_ARGS_METADATA } from '@nestjs/common/constants';
import { CurrentUser } from '@common/decorators/current-user.decorator';

type ParamFactory = (data: unknown, ctx: ExecutionContext) => unknown;

function getParamDecoratorFactory(): ParamFactory {
  class TestController {
    handle(@CurrentUser() _userId: string): void {}
  }

  const args: Record<string, { factory: ParamFactory }> = Reflect.getMetadata(
    ROUTE_ARGS_METADATA,
    TestController,
    'handle',
  );
  return args[Object.keys(args)[0]].factory;
}

describe('CurrentUser', () => {
  const contextFor = (request: object): ExecutionContext =>
    ({
      switchToHttp: () => ({ getRequest: () => request }),
    }) as unknown as ExecutionContext;

  it('should return the id set by the identity guard', () => {
    const factory = getParamDecoratorFactory();

    expect(factory(undefined, contextFor({ user: { id: 'user-123' } }))).toBe('user-123');
  });

  it('should return null when no identity was attached', () => {
    const factory = getParamDecoratorFactory();

    expect(factory(undefined, contextFor({}))).toBeNull();
  });
});
