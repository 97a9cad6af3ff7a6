import { envValidationSchema } from './env.validation';

describe('envValidationSchema', () => {
  it('should apply defaults', () => {
    const { error, value } = envValidationSchema.validate({});

    expect(error).toBeUndefined();
    expect(value).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'warn',
      FAKE_MAX_AGE: 100,
    });
  });

  it('should convert numeric strings from the environment', () => {
    const { value } = envValidationSchema.validate({ FAKE_MAX_AGE: '60' });

    expect(value.FAKE_MAX_AGE).toBe(60);
  });

  it('should reject unknown log levels and out-of-range ages', () => {
    const { error } = envValidationSchema.validate(
      { LOG_LEVEL: 'trace', FAKE_MAX_AGE: 0 },
      { abortEarly: false },
    );

    expect(error?.details.map((detail) => detail.path[0])).toEqual([
      'LOG_LEVEL',
      'FAKE_MAX_AGE',
    ]);
  });
});
