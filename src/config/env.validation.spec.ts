import { validate } from './env.validation';

describe('validate (environment)', () => {
  const baseEnv = {
    GCP_PROJECT_ID: 'test-project',
    GOOGLE_APPLICATION_CREDENTIALS: 'test-service-account.json',
  };

  it('should accept the minimal environment', () => {
    const result = validate({ ...baseEnv });

    expect(result.GCP_PROJECT_ID).toBe('test-project');
    expect(result.GOOGLE_APPLICATION_CREDENTIALS).toBe(
      'test-service-account.json',
    );
  });

  it('should convert numeric variables', () => {
    const result = validate({
      ...baseEnv,
      PORT: '8080',
      IMAGE_FETCH_MAX_BYTES: '2048',
    });

    expect(result.PORT).toBe(8080);
    expect(result.IMAGE_FETCH_MAX_BYTES).toBe(2048);
  });

  it('should fail fast when the project id is missing', () => {
    expect(() =>
      validate({ GOOGLE_APPLICATION_CREDENTIALS: 'test-service-account.json' }),
    ).toThrow('GCP_PROJECT_ID should not be empty');
  });

  it('should fail fast when the credential is empty', () => {
    expect(() =>
      validate({ ...baseEnv, GOOGLE_APPLICATION_CREDENTIALS: '' }),
    ).toThrow('GOOGLE_APPLICATION_CREDENTIALS should not be empty');
  });

  it('should reject a non-numeric port', () => {
    expect(() => validate({ ...baseEnv, PORT: 'eighty' })).toThrow(
      'PORT must be an integer number',
    );
  });

  it('should reject an unknown startup verification flag', () => {
    expect(() =>
      validate({ ...baseEnv, VERTEX_VERIFY_ON_STARTUP: 'maybe' }),
    ).toThrow('VERTEX_VERIFY_ON_STARTUP must be one of the following values');
  });
});
