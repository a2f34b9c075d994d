import { isAllowedUrl, validatePositive } from '../config.validators';

describe('isAllowedUrl', () => {
  it('should accept absolute http and https URLs', () => {
    expect(isAllowedUrl('http://127.0.0.1:8080')).toBe(true);
    expect(isAllowedUrl('https://acs.example.test/base')).toBe(true);
  });

  it('should reject other protocols', () => {
    expect(isAllowedUrl('ftp://acs.example.test')).toBe(false);
    expect(isAllowedUrl('javascript:alert(1)')).toBe(false);
  });

  it('should reject relative or unparseable values', () => {
    expect(isAllowedUrl('/processor/mock/acs')).toBe(false);
    expect(isAllowedUrl('')).toBe(false);
  });
});

describe('validatePositive', () => {
  it('should return positive values unchanged', () => {
    expect(validatePositive('TDS_SERVER_PORT', 8080)).toBe(8080);
  });

  it('should throw for zero', () => {
    expect(() => validatePositive('TDS_TRANSACTION_TTL', 0)).toThrow(
      'TDS_TRANSACTION_TTL must be greater than 0 (got 0)',
    );
  });
});
