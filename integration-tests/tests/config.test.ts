import { config, validateConfig, ConfigurationError } from '@docmerge/shared';

describe('validateConfig', () => {
  const base = {
    ...config,
    confidenceThreshold: 0.7,
    reviewThreshold: 0.9,
    maxContentLength: 25000,
    defaultTitleMinLength: 10,
  };

  it('should accept the default thresholds', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('should reject a threshold above 1', () => {
    expect(() => validateConfig({ ...base, reviewThreshold: 1.5 })).toThrow(ConfigurationError);
  });

  it('should reject a review threshold below the confidence threshold', () => {
    try {
      validateConfig({ ...base, confidenceThreshold: 0.8, reviewThreshold: 0.75 });
      throw new Error('expected validateConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.details.problems).toEqual([
          'REVIEW_THRESHOLD must be greater than or equal to CONFIDENCE_THRESHOLD',
        ]);
      }
    }
  });

  it('should reject a tiny content limit', () => {
    expect(() => validateConfig({ ...base, maxContentLength: 10 })).toThrow(
      'Invalid configuration'
    );
  });
});
