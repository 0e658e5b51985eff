import { CallHandler, ExecutionContext } from '@nestjs/common';
import { mockDeep } from 'jest-mock-extended';
import { firstValueFrom, of } from 'rxjs';
import { TransformInterceptor } from './transform.interceptor';

describe('TransformInterceptor', () => {
  const context = mockDeep<ExecutionContext>();

  function handlerOf<T>(data: T): CallHandler<T> {
    return { handle: () => of(data) };
  }

  it('should wrap data with a timestamp', async () => {
    const interceptor = new TransformInterceptor<{ id: number }>();
    const before = new Date().toISOString();

    const result = await firstValueFrom(interceptor.intercept(context, handlerOf({ id: 1 })));

    expect(result?.data).toEqual({ id: 1 });
    expect((result?.meta.timestamp ?? '') >= before).toBe(true);
  });

  it('should wrap arrays and objects that have a data key', async () => {
    const listInterceptor = new TransformInterceptor<string[]>();
    const objectInterceptor = new TransformInterceptor<{ data: string }>();

    const list = await firstValueFrom(listInterceptor.intercept(context, handlerOf(['a'])));
    const object = await firstValueFrom(
      objectInterceptor.intercept(context, handlerOf({ data: 'x' })),
    );

    expect(list?.data).toEqual(['a']);
    expect(object?.data).toEqual({ data: 'x' });
  });

  it('should pass empty results through', async () => {
    const interceptor = new TransformInterceptor<undefined>();

    const result = await firstValueFrom(interceptor.intercept(context, handlerOf(undefined)));

    expect(result).toBeUndefined();
  });
});
