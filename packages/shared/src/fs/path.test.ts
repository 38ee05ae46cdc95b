import { basename, join, normalizePath } from './path';

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

    it('should drop a leading current-directory segment', () => {
      expect(join('.', 'a.txt')).toBe('a.txt');
    });
  });

  describe('basename', () => {
    it('should return the last segment', () => {
      expect(basename('a/b/c.txt')).toBe('c.txt');
      expect(basename('c.txt')).toBe('c.txt');
      expect(basename('a/b/')).toBe('b');
    });
  });
});
