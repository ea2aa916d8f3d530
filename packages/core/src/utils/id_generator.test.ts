import {
  generateSessionId,
  generateTaskId,
  sanitizeForId,
} from './id_generator';

describe('ID Generators', () => {
  describe('sanitizeForId', () => {
    it('should lower-case and hyphenate separators', () => {
      expect(sanitizeForId('Local_Shell.run Now')).toBe('local-shell-run-now');
    });

    it('should drop characters outside the slug alphabet', () => {
      expect(sanitizeForId('github/close: #42')).toBe('githubclose-42');
    });

    it('should cap slugs at 50 characters', () => {
      expect(sanitizeForId('a'.repeat(80))).toHaveLength(50);
    });
  });

  describe('generateTaskId', () => {
    it('should create a task ID from timestamp, slug and suffix', () => {
      expect(generateTaskId('echo.run', 12345, 'abcd0001')).toBe('12345-task-echo-run-abcd0001');
    });

    it('should fall back to a generic slug for empty names', () => {
      expect(generateTaskId('!!!', 12345, 'abcd0001')).toBe('12345-task-task-abcd0001');
    });

    it('should create distinct IDs for the same name and timestamp', () => {
      const first = generateTaskId('echo.run', 12345);
      const second = generateTaskId('echo.run', 12345);

      expect(first).not.toBe(second);
      expect(first).toMatch(/^12345-task-echo-run-[0-9a-f]{8}$/);
    });
  });

  describe('generateSessionId', () => {
    it('should create a session ID', () => {
      expect(generateSessionId('cli', 777, 'ffff0000')).toBe('777-session-cli-ffff0000');
    });
  });
});
