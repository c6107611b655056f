import { ConfigurationError, isLayoutError, LayoutError } from './errors.js';

describe('ConfigurationError', () => {
  it('should keep its class, code and hint', () => {
    const error = new ConfigurationError('bad', 'PIE-EMPTY-SERIES', 'add a value');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toBeInstanceOf(LayoutError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('PIE-EMPTY-SERIES');
    expect(error.hint).toBe('add a value');
  });

  it('should default the code', () => {
    expect(new ConfigurationError('bad').code).toBe('PIE-CONFIG-INVALID');
  });
});

describe('isLayoutError', () => {
  it('should only accept layout errors', () => {
    expect(isLayoutError(new ConfigurationError('bad'))).toBe(true);
    expect(isLayoutError(new Error('bad'))).toBe(false);
    expect(isLayoutError('bad')).toBe(false);
  });
});
