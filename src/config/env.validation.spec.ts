import { validate } from './env.validation';

const baseEnv = {
  MONGODB_URI: 'mongodb://localhost:27017/cinema',
  JWT_ACCESS_SECRET: 'test-secret',
};

describe('validate', () => {
  it('applies defaults and converts types', () => {
    const env = validate({ ...baseEnv, PORT: '4000', COOKIE_SECURE: 'true' });
    expect(env.PORT).toBe(4000);
    expect(env.COOKIE_SECURE).toBe(true);
    expect(env.NODE_ENV).toBe('development');
    expect(env.MEDIA_ROOT).toBe('./media');
    expect(env.MEDIA_URL).toBe('/media/');
  });

  it('reads COOKIE_SECURE=false as false', () => {
    expect(validate({ ...baseEnv, COOKIE_SECURE: 'false' }).COOKIE_SECURE).toBe(
      false,
    );
  });

  it('requires the JWT secret', () => {
    expect(() =>
      validate({ MONGODB_URI: 'mongodb://localhost:27017/cinema' }),
    ).toThrow(/Config validation error/);
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => validate({ ...baseEnv, NODE_ENV: 'staging' })).toThrow(
      /NODE_ENV/,
    );
  });
});
