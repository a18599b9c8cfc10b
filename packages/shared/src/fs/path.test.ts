import { join, normalizePath, isWithin } from './path';

describe('path', () => {
  describe('normalizePath', () => {
    it('should replace backslashes with forward slashes', () => {
      expect(normalizePath('foo\\bar')).toBe('foo/bar');
    });

    it('should not alter paths with forward slashes', () => {
      expect(normalizePath('foo/bar')).toBe('foo/bar');
    });
  });

  describe('join', () => {
    it('should join paths and normalize', () => {
      expect(join('foo', 'bar', '..', 'baz')).toBe('foo/baz');
    });
  });

  describe('isWithin', () => {
    it('accepts the root and its descendants', () => {
      expect(isWithin('/work/repo', '/work/repo')).toBe(true);
      expect(isWithin('/work/repo', '/work/repo/src/a.py')).toBe(true);
    });

    it('rejects siblings that share a prefix', () => {
      expect(isWithin('/work/repo', '/work/repo2/a.py')).toBe(false);
      expect(isWithin('/work/repo', '/work')).toBe(false);
    });

    it('accepts names that merely start with two dots', () => {
      expect(isWithin('/work/repo', '/work/repo/..hidden')).toBe(true);
    });
  });
});
