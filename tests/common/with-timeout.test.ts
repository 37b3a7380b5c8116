import { CourseQueryTimeoutError, withTimeout } from '../../src/common/utils/with-timeout';

describe('withTimeout', () => {
  it('resolves with the work result when it finishes in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'quick')).resolves.toBe(7);
  });

  it('passes the work rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, 'failing')).rejects.toThrow('boom');
  });

  it('rejects with a timeout error when the work is too slow', async () => {
    const never = new Promise<number>(() => undefined);

    const error = await withTimeout(never, 10, 'Course search').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(CourseQueryTimeoutError);
    expect(error).toMatchObject({ message: 'Course search timed out after 10ms', timeoutMs: 10 });
  });
});
