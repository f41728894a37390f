import { describe, it, expect } from 'vitest';
import { errorMessage, SeederConfigError, SeederReadError, SeederWriteError } from '../../src/seeder/errors';

describe('seeder: errors', () => {

  describe('SeederConfigError', () => {

    it('keeps the reason', () => {
      const error = new SeederConfigError('table-not-found', 'Table "users" could not be found in database');

      expect(error.name).toBe('SeederConfigError');
      expect(error.reason).toBe('table-not-found');
      expect(error.message).toBe('Table "users" could not be found in database');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('SeederWriteError', () => {

    it('describes a failed insert', () => {
      const cause = new Error('connection reset');
      const error = new SeederWriteError('insert', 'users', 50, cause);

      expect(error.name).toBe('SeederWriteError');
      expect(error.message).toBe('Failed to insert 50 row(s) into "users": connection reset');
      expect(error.cause).toBe(cause);
      expect(error.rowCount).toBe(50);
    });

    it('describes a failed truncate', () => {
      const error = new SeederWriteError('truncate', 'users', 0, new Error('lock timeout'));

      expect(error.message).toBe('Failed to truncate table "users": lock timeout');
    });

    it('handles causes that are not errors', () => {
      const error = new SeederWriteError('insert', 'users', 1, 'boom');

      expect(error.message).toBe('Failed to insert 1 row(s) into "users": Unknown error');
      expect(error.cause).toBe('boom');
    });
  });

  describe('SeederReadError', () => {

    it('names the source and keeps the tokenizer error', () => {
      const cause = new Error('Quote Not Closed');
      const error = new SeederReadError('users.csv', cause);

      expect(error.name).toBe('SeederReadError');
      expect(error.message).toBe('Failed to read "users.csv": Quote Not Closed');
      expect(error.source).toBe('users.csv');
      expect(error.cause).toBe(cause);
    });
  });

  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage(42)).toBe('Unknown error');
  });
});
